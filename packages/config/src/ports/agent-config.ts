export const ioModes = ["file", "http"] as const
export type IoMode = (typeof ioModes)[number]

export const operationModes = ["full", "minimal", "heartbeat"] as const
export type OperationMode = (typeof operationModes)[number]

/** Verbosity of the agent's own log, as written in the config file. */
export const agentLogLevels = ["debug", "info", "warning", "error"] as const
export type AgentLogLevel = (typeof agentLogLevels)[number]

/** How failed jobs reported by the job-monitoring wrapper are processed. */
export const jobSeverities = ["alert", "warning", "none"] as const
export type JobSeverity = (typeof jobSeverities)[number]

/**
 * The smallest set of settings that makes a usable config file.
 * Written on first start when no config file exists.
 */
export type MinValuableConfig = {
  logLevel: AgentLogLevel
  ioMode: IoMode

  /** Output file path when `ioMode` is "file" */
  outFile: string

  hubUrl: string
  hubUser: string
  hubPassword: string
}

export type CpuUtilisationAnalysisConfig = {
  /** Target value to start the analysis */
  threshold: number

  /** Threshold compare function: "lt", "lte", "gt" or "gte" */
  function: string

  /** "user", "system", "idle" or "iowait" */
  metric: string

  /** One of the values of `cpuUtilDataGather` */
  gatheringMode: string

  /** Number of processes to report */
  reportProcesses: number

  /** Minutes the analysis continues after utilisation returns to normal */
  trailingProcessAnalysisMinutes: number
}

export type LogsFilesConfig = {
  /** Log of the objects sent to the hub */
  hubFile: string
}

export type StorCliConfig = {
  binaryPath: string
}

export type JobMonitoringConfig = {
  spoolDirPath: string
  recordStdErr: boolean
  recordStdOut: boolean
  severity: string
}

export type SystemUpdatesChecksConfig = {
  enabled: boolean

  /** Seconds the package manager may spend fetching available updates */
  fetchTimeout: number

  /** Seconds between checks */
  checkInterval: number
}

export type MysqlMonitoringConfig = {
  enabled: boolean

  /** Connection string, e.g. "user:secret@tcp(127.0.0.1:3306)/" */
  connect: string
}

export type ProcessMonitoringConfig = {
  enabled: boolean
  enableKernelTaskMonitoring: boolean
}

export type SelfUpdateConfig = {
  enabled: boolean

  /** Feed the agent polls for new versions */
  url: string

  /** Seconds between checks */
  checkInterval: number
}

export type DockerMonitoringConfig = {
  enabled: boolean
}

/**
 * Full runtime configuration of the agent.
 *
 * Intervals and timeouts are in seconds. Every property has a default from
 * {@link createDefaultConfig}; the TOML key of each property is listed in
 * the descriptor table (`agentConfigSchema`).
 */
export type AgentConfig = MinValuableConfig & {
  operationMode: string
  interval: number
  heartbeatInterval: number

  pidFile: string
  logFile: string
  logSyslog: string

  hubGzip: boolean
  hubRequestTimeout: number
  hubProxy: string
  hubProxyUser: string
  hubProxyPassword: string

  cpuLoadDataGather: string[]
  cpuUtilDataGather: string[]
  cpuUtilTypes: string[]

  fsTypeInclude: string[]
  fsPathExclude: string[]
  fsPathExcludeRecurse: boolean
  fsMetrics: string[]
  fsIdentifyMountpointsByDevice: boolean

  netInterfaceExclude: string[]
  netInterfaceExcludeRegex: string[]
  netInterfaceExcludeDisconnected: boolean
  netInterfaceExcludeLoopback: boolean
  netMetrics: string[]

  /** "" to auto-detect, otherwise bytes per second with a K, M or G suffix */
  netInterfaceMaxSpeed: string

  systemFields: string[]
  virtualMachinesStat: string[]
  hardwareInventory: boolean
  discoverAutostartingServicesOnly: boolean

  cpuUtilisationAnalysis: CpuUtilisationAnalysisConfig

  temperatureMonitoring: boolean
  softwareRaidMonitoring: boolean
  smartMonitoring: boolean
  smartctl: string

  logs: LogsFilesConfig
  storCli: StorCliConfig
  jobMonitoring: JobMonitoringConfig
  systemUpdatesChecks: SystemUpdatesChecksConfig
  mysqlMonitoring: MysqlMonitoringConfig
  processMonitoring: ProcessMonitoringConfig
  selfUpdate: SelfUpdateConfig
  dockerMonitoring: DockerMonitoringConfig

  memMonitoring: boolean
  cpuMonitoring: boolean
  fsMonitoring: boolean
  netMonitoring: boolean

  onHttp5xxRetries: number
  onHttp5xxRetryInterval: number
}

/**
 * Keys removed from the schema that are still read from old files so they
 * can be translated once.
 */
export type DeprecatedConfig = {
  windowsUpdatesWatcherInterval: number
}

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends (infer U)[]
    ? readonly U[]
    : T[K] extends object
      ? DeepReadonly<T[K]>
      : T[K]
}

export type ReadonlyAgentConfig = DeepReadonly<AgentConfig>
