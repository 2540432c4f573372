import { z } from "zod"

import {
  agentLogLevels,
  ioModes,
  type AgentConfig,
  type CpuUtilisationAnalysisConfig,
  type DeprecatedConfig,
  type DockerMonitoringConfig,
  type JobMonitoringConfig,
  type LogsFilesConfig,
  type MinValuableConfig,
  type MysqlMonitoringConfig,
  type ProcessMonitoringConfig,
  type SelfUpdateConfig,
  type StorCliConfig,
  type SystemUpdatesChecksConfig,
} from "../../ports/agent-config"
import { descriptorsFor, type Descriptor } from "./descriptor"

const float = z.number()
const int = z.number().int()
const uint = z.number().int().nonnegative()
const str = z.string()
const bool = z.boolean()
const strings = z.array(z.string())

const cpuAnalysis = descriptorsFor<CpuUtilisationAnalysisConfig>()
const logs = descriptorsFor<LogsFilesConfig>()
const storCli = descriptorsFor<StorCliConfig>()
const jobmon = descriptorsFor<JobMonitoringConfig>()
const updates = descriptorsFor<SystemUpdatesChecksConfig>()
const mysql = descriptorsFor<MysqlMonitoringConfig>()
const processes = descriptorsFor<ProcessMonitoringConfig>()
const selfUpdate = descriptorsFor<SelfUpdateConfig>()
const docker = descriptorsFor<DockerMonitoringConfig>()

const mvc = descriptorsFor<MinValuableConfig>()
const d = descriptorsFor<AgentConfig>()

const logLevelField = {
  key: "log_level",
  comment: '"debug", "info", "warning" or "error"; can be overridden with --log-level',
} as const

const outFileComment = [
  'output file path in io_mode = "file"',
  "backslashes must be escaped on windows, e.g.",
  'out_file = "C:\\\\hostmon.data.txt"',
].join("\n")

/**
 * The subset written to a freshly bootstrapped config file.
 */
export const minValuableSchema: readonly Descriptor<MinValuableConfig>[] = [
  mvc.field(logLevelField.key, "logLevel", z.enum(agentLogLevels), { comment: logLevelField.comment }),
  mvc.field("io_mode", "ioMode", z.enum(ioModes)),
  mvc.field("out_file", "outFile", str, { comment: outFileComment, omitEmpty: true }),
  mvc.field("hub_url", "hubUrl", str, { commented: true }),
  mvc.field("hub_user", "hubUser", str, { commented: true }),
  mvc.field("hub_password", "hubPassword", str, { commented: true }),
]

/**
 * Every key of the config file, in dump order.
 */
export const agentConfigSchema: readonly Descriptor<AgentConfig>[] = [
  d.field(logLevelField.key, "logLevel", z.enum(agentLogLevels), { comment: logLevelField.comment }),
  d.field("io_mode", "ioMode", z.enum(ioModes)),
  d.field("out_file", "outFile", str, { comment: outFileComment, omitEmpty: true }),
  d.field("hub_url", "hubUrl", str, { commented: true }),
  d.field("hub_user", "hubUser", str, { commented: true }),
  d.field("hub_password", "hubPassword", str, { commented: true }),

  d.field("operation_mode", "operationMode", str, {
    comment: [
      "one of:",
      '"full": every check unless disabled individually below (default)',
      '"minimal": CPU utilisation, CPU load, memory usage and disk fill levels only',
      '"heartbeat": only the heartbeat, sent every `heartbeat` seconds',
      "applies to io_mode = http only",
    ].join("\n"),
  }),
  d.field("interval", "interval", float, { comment: "seconds between metric pushes to the hub", numeric: "float" }),
  d.field("heartbeat", "heartbeatInterval", float, {
    comment: "seconds between heartbeats sent without metrics",
    numeric: "float",
  }),

  d.field("pid", "pidFile", str, { comment: "pid file location" }),
  d.field("log", "logFile", str, { comment: "log file location", omitEmpty: true }),
  d.field("log_syslog", "logSyslog", str, {
    comment: '"local" for the local unix socket or a URL such as "udp://localhost:514"',
  }),

  d.field("hub_gzip", "hubGzip", bool, { comment: "gzip requests sent to the hub" }),
  d.field("hub_request_timeout", "hubRequestTimeout", int, {
    comment: "request time limit in seconds, including connect, redirects and body\nmin 1, max 600, default 30",
    numeric: "integer",
  }),
  d.field("hub_proxy", "hubProxy", str, { commented: true }),
  d.field("hub_proxy_user", "hubProxyUser", str, { commented: true }),
  d.field("hub_proxy_password", "hubProxyPassword", str, { commented: true }),

  d.field("cpu_load_data_gathering_mode", "cpuLoadDataGather", strings, { comment: "default ['avg1']" }),
  d.field("cpu_utilisation_gathering_mode", "cpuUtilDataGather", strings, { comment: "default ['avg1']" }),
  d.field("cpu_utilisation_types", "cpuUtilTypes", strings, {
    comment: "default ['user', 'system', 'idle', 'iowait']",
  }),

  d.field("fs_type_include", "fsTypeInclude", strings, {
    comment: "default ['ext3', 'ext4', 'xfs', 'jfs', 'ntfs', 'btrfs', 'hfs', 'apfs', 'fat32', 'smbfs', 'nfs']",
  }),
  d.field("fs_path_exclude", "fsPathExclude", strings, { comment: "file systems excluded by path, empty by default" }),
  d.field("fs_path_exclude_recurse", "fsPathExcludeRecurse", bool, {
    comment: "false: each excluded path must be a mountpoint\ntrue: every mountpoint below an excluded path is skipped",
  }),
  d.field("fs_metrics", "fsMetrics", strings, {
    comment:
      "default ['free_B', 'free_percent', 'total_B', 'read_B_per_s', 'write_B_per_s', 'read_ops_per_s', 'write_ops_per_s', 'inodes_used_percent']",
  }),
  d.field("fs_identify_mountpoints_by_device", "fsIdentifyMountpointsByDevice", bool, {
    comment: "skip bind mounts: mountpoints sharing a device with an earlier one are ignored\nlinux only",
  }),

  d.field("net_interface_exclude", "netInterfaceExclude", strings, { commented: true }),
  d.field("net_interface_exclude_regex", "netInterfaceExcludeRegex", strings, {
    comment: 'default ["^vnet(.*)$", "^virbr(.*)$", "^vmnet(.*)$", "^vEthernet(.*)$"], plus "Pseudo-Interface" on windows',
  }),
  d.field("net_interface_exclude_disconnected", "netInterfaceExcludeDisconnected", bool, { comment: "default true" }),
  d.field("net_interface_exclude_loopback", "netInterfaceExcludeLoopback", bool, { comment: "default true" }),
  d.field("net_metrics", "netMetrics", strings, {
    comment: "default ['in_B_per_s', 'out_B_per_s', 'total_out_B_per_s', 'total_in_B_per_s']",
  }),
  d.field("net_interface_max_speed", "netInterfaceMaxSpeed", str, {
    comment: [
      "empty: ask the network cards for their maximum speed (default)",
      "otherwise bytes per second with a K, M or G suffix",
      'e.g. "125M" (1 Gbit), "12.5M" (100 Mbit), "12.5G" (100 Gbit)',
    ].join("\n"),
  }),

  d.field("system_fields", "systemFields", strings, {
    comment: "default ['uname', 'os_kernel', 'os_family', 'os_arch', 'cpu_model', 'fqdn', 'memory_total_B']",
  }),
  d.field("virtual_machines_stat", "virtualMachinesStat", strings, {
    comment: "default ['hyper-v'] on windows, available options: 'hyper-v'",
  }),
  d.field("hardware_inventory", "hardwareInventory", bool, { comment: "default true" }),
  d.field("discover_autostarting_services_only", "discoverAutostartingServicesOnly", bool, {
    comment: "default true",
  }),

  d.table("cpu_utilisation_analysis", "cpuUtilisationAnalysis", [
    cpuAnalysis.field("threshold", "threshold", float, {
      comment: "value that starts the analysis",
      numeric: "float",
    }),
    cpuAnalysis.field("function", "function", str, { comment: "'lt', 'lte', 'gt' or 'gte'" }),
    cpuAnalysis.field("metric", "metric", str, { comment: "'user', 'system', 'idle' or 'iowait'" }),
    cpuAnalysis.field("gathering_mode", "gatheringMode", str, {
      comment: "one of the values of cpu_utilisation_gathering_mode",
    }),
    cpuAnalysis.field("report_processes", "reportProcesses", int, {
      comment: "number of processes to report",
      numeric: "integer",
    }),
    cpuAnalysis.field("trailing_process_analysis_minutes", "trailingProcessAnalysisMinutes", int, {
      comment: "minutes the analysis continues after utilisation is back to normal",
      numeric: "integer",
    }),
  ]),

  d.field("temperature_monitoring", "temperatureMonitoring", bool, { comment: "default true" }),
  d.field("software_raid_monitoring", "softwareRaidMonitoring", bool, {
    comment: "detect software raids from /proc/mdstat and monitor them\ndefault true",
  }),
  d.field("smart_monitoring", "smartMonitoring", bool, { comment: "S.M.A.R.T monitoring of disks\ndefault false" }),
  d.field("smartctl", "smartctl", str, { comment: "path to a smartctl binary, version 7 or later" }),

  d.table("logs", "logs", [
    logs.field("hub_file", "hubFile", str, { comment: "log of the objects sent to the hub", omitEmpty: true }),
  ]),

  d.table(
    "storcli",
    "storCli",
    [
      storCli.field("binary", "binaryPath", str, {
        comment: "windows: binary = 'C:\\Program Files\\storcli\\storcli64.exe'\nlinux: binary = '/opt/storcli/sbin/storcli64'",
      }),
    ],
    { comment: "MegaRAID health reported by storcli, always run through sudo on linux" },
  ),

  d.table(
    "jobmon",
    "jobMonitoring",
    [
      jobmon.field("spool_dir", "spoolDirPath", str, { comment: "spool directory" }),
      jobmon.field("record_stderr", "recordStdErr", bool, { comment: "keep the last 4 KB of stderr, default true" }),
      jobmon.field("record_stdout", "recordStdOut", bool, { comment: "keep the last 4 KB of stdout, default false" }),
      jobmon.field("severity", "severity", str, {
        comment: "how failed jobs are reported: alert, warning or none, default alert",
      }),
    ],
    { comment: "job monitoring wrapper" },
  ),

  d.table(
    "system_updates_checks",
    "systemUpdatesChecks",
    [
      updates.field("enabled", "enabled", bool, { comment: "set to false to stop checking for updates" }),
      updates.field("fetch_timeout", "fetchTimeout", uint, {
        comment: "seconds the package manager may spend fetching updates, ignored on windows",
        numeric: "integer",
      }),
      updates.field("check_interval", "checkInterval", uint, {
        comment: "seconds between checks, at least 300",
        numeric: "integer",
      }),
    ],
    { comment: "available operating system updates (apt, yum or windows update)" },
  ),

  d.table(
    "mysql_monitoring",
    "mysqlMonitoring",
    [
      mysql.field("enabled", "enabled", bool, { comment: "default false" }),
      mysql.field("connect", "connect", str, { comment: 'e.g. "user:secret@tcp(127.0.0.1:3306)/"' }),
    ],
    { comment: "basic MySQL or MariaDB performance metrics, experimental" },
  ),

  d.table(
    "process_monitoring",
    "processMonitoring",
    [
      processes.field("enabled", "enabled", bool, { comment: "default true" }),
      processes.field("enable_kernel_task_monitoring", "enableKernelTaskMonitoring", bool, {
        comment: "include kernel tasks, linux only, default true",
      }),
    ],
    { comment: "running processes reported to the hub" },
  ),

  d.table(
    "self_update",
    "selfUpdate",
    [
      selfUpdate.field("enabled", "enabled", bool, { comment: "set to false to disable self-updates" }),
      selfUpdate.field("url", "url", str, { comment: "updates feed" }),
      selfUpdate.field("check_interval", "checkInterval", uint, {
        comment: "seconds between checks for a new version",
        numeric: "integer",
      }),
    ],
    { comment: "self-updates, windows only" },
  ),

  d.table(
    "docker_monitoring",
    "dockerMonitoring",
    [docker.field("enabled", "enabled", bool, { comment: "set to false to disable docker monitoring" })],
    { comment: "running docker containers reported to the hub" },
  ),

  d.field("mem_monitoring", "memMonitoring", bool, {
    comment: "turn parts of the monitoring on or off; operation_mode presets take precedence\n\nmemory",
  }),
  d.field("cpu_monitoring", "cpuMonitoring", bool, { comment: "CPU, including cpu_utilisation_analysis" }),
  d.field("fs_monitoring", "fsMonitoring", bool, { comment: "disks and file systems" }),
  d.field("net_monitoring", "netMonitoring", bool, { comment: "network" }),

  d.field("on_http_5xx_retries", "onHttp5xxRetries", int, {
    comment: "retries after a 5xx reply from the hub",
    numeric: "integer",
  }),
  d.field("on_http_5xx_retry_interval", "onHttp5xxRetryInterval", float, {
    comment: "seconds between retries after a 5xx reply",
    numeric: "float",
  }),
]

const deprecated = descriptorsFor<DeprecatedConfig>()

/** Keys that are read once for migration and never written back. */
export const deprecatedSchema: readonly Descriptor<DeprecatedConfig>[] = [
  deprecated.field("windows_updates_watcher_interval", "windowsUpdatesWatcherInterval", int, { numeric: "integer" }),
]
