import type { AgentConfig, DeprecatedConfig, MinValuableConfig } from "../../ports/agent-config"
import { SELF_UPDATE_FEED_URL } from "../constants"
import { defaultPaths, type HostInfo } from "./host"

export function createDefaultMinValuableConfig(): MinValuableConfig {
  return {
    logLevel: "error",
    ioMode: "http",
    outFile: "",
    hubUrl: "",
    hubUser: "",
    hubPassword: "",
  }
}

export function createDeprecatedConfig(): DeprecatedConfig {
  return { windowsUpdatesWatcherInterval: 0 }
}

/**
 * Build a fully populated config for the given host. Never fails.
 */
export function createDefaultConfig(host: HostInfo): AgentConfig {
  const config: AgentConfig = {
    ...createDefaultMinValuableConfig(),

    operationMode: "full",
    interval: 90,
    heartbeatInterval: 15,

    pidFile: "",
    logFile: defaultPaths(host).logFile,
    logSyslog: "",

    hubGzip: true,
    hubRequestTimeout: 30,
    hubProxy: "",
    hubProxyUser: "",
    hubProxyPassword: "",

    cpuLoadDataGather: ["avg1"],
    cpuUtilDataGather: ["avg1"],
    cpuUtilTypes: ["user", "system", "idle", "iowait"],

    fsTypeInclude: ["ext3", "ext4", "xfs", "jfs", "ntfs", "btrfs", "hfs", "apfs", "fat32", "smbfs", "nfs"],
    fsPathExclude: [],
    fsPathExcludeRecurse: false,
    fsMetrics: [
      "free_B",
      "free_percent",
      "total_B",
      "read_B_per_s",
      "write_B_per_s",
      "read_ops_per_s",
      "write_ops_per_s",
    ],
    fsIdentifyMountpointsByDevice: true,

    netInterfaceExclude: [],
    netInterfaceExcludeRegex: ["^vnet(.*)$", "^virbr(.*)$", "^vmnet(.*)$", "^vEthernet(.*)$"],
    netInterfaceExcludeDisconnected: true,
    netInterfaceExcludeLoopback: true,
    netMetrics: ["in_B_per_s", "out_B_per_s", "total_out_B_per_s", "total_in_B_per_s"],
    netInterfaceMaxSpeed: "",

    systemFields: ["uname", "os_kernel", "os_family", "os_arch", "cpu_model", "fqdn", "memory_total_B"],
    virtualMachinesStat: [],
    hardwareInventory: true,
    discoverAutostartingServicesOnly: true,

    cpuUtilisationAnalysis: {
      threshold: 10,
      function: "lt",
      metric: "idle",
      gatheringMode: "avg1",
      reportProcesses: 5,
      trailingProcessAnalysisMinutes: 5,
    },

    temperatureMonitoring: true,
    softwareRaidMonitoring: true,
    smartMonitoring: false,
    smartctl: "",

    logs: { hubFile: "" },
    storCli: { binaryPath: "" },
    jobMonitoring: {
      spoolDirPath: "/var/lib/hostmon/jobmon",
      recordStdErr: true,
      recordStdOut: false,
      severity: "alert",
    },
    systemUpdatesChecks: {
      enabled: true,
      fetchTimeout: 30,
      checkInterval: 14_400,
    },
    mysqlMonitoring: { enabled: false, connect: "" },
    processMonitoring: { enabled: true, enableKernelTaskMonitoring: true },
    selfUpdate: {
      enabled: false,
      url: "",
      checkInterval: 21_600,
    },
    dockerMonitoring: { enabled: true },

    memMonitoring: true,
    cpuMonitoring: true,
    fsMonitoring: true,
    netMonitoring: true,

    onHttp5xxRetries: 4,
    onHttp5xxRetryInterval: 2,
  }

  switch (host.platform) {
    case "win32":
      config.netInterfaceExcludeRegex.push("Pseudo-Interface")
      config.cpuLoadDataGather = []
      config.cpuUtilTypes = ["user", "system", "idle"]
      config.virtualMachinesStat = ["hyper-v"]
      config.jobMonitoring.spoolDirPath = "C:\\ProgramData\\hostmon\\jobmon"
      config.selfUpdate.enabled = true
      config.selfUpdate.url = SELF_UPDATE_FEED_URL
      break
    case "darwin":
      config.jobMonitoring.spoolDirPath = "/usr/local/var/lib/hostmon/jobmon"
      break
    default:
      config.fsMetrics.push("inodes_used_percent")
  }

  return config
}
