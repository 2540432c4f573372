/** Seconds */
export const MIN_INTERVAL = 30
export const MIN_HEARTBEAT_INTERVAL = 5

export const MIN_HUB_REQUEST_TIMEOUT = 1
export const MAX_HUB_REQUEST_TIMEOUT = 600

export const MIN_SYSTEM_UPDATES_CHECK_INTERVAL = 300
export const MIN_SELF_UPDATE_CHECK_INTERVAL = 600

export const MAX_HTTP_5XX_RETRIES = 5
export const MIN_HTTP_5XX_RETRY_INTERVAL = 1
export const MAX_HTTP_5XX_RETRY_INTERVAL = 3

export const SELF_UPDATE_FEED_URL = "https://updates.hostmon.dev/windows/feed/rolling"

/** Written above the generated and saved config files. */
export const CONFIG_FILE_HEADER = `# This is an auto-generated config to connect with the monitoring hub
# To see all options of hostmon run hostmon-config --print-config

`
