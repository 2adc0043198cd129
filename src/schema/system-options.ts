// Option declarations for the composed system tree. Mirrors data/profiles/baseline.yaml;
// defaults here fill keys a tree leaves out, the baseline supplies everything else.
import type { OptionSchema } from "../types/option.js";
import {
  mkBoolOption,
  mkServiceEnableOption,
  mkEnumOption,
  mkPercentageOption,
  mkIntRangeOption,
  mkMemoryOption,
  mkScheduleOption,
  mkPathOption,
  mkStringListOption,
  mkNetworkOption,
  mkPortOption,
  mkIntOption,
  mkTimeWindowOptions,
  mkRateLimitOptions,
} from "../options/builder.js";

const kernel: OptionSchema = {
  enable: mkBoolOption({ default: true, description: "Apply kernel tuning" }),
  profile: mkEnumOption({
    values: ["balanced", "performance", "throughput", "lowLatency"],
    default: "balanced",
    description: "Scheduler tuning preset",
  }),
  cpuScheduler: mkEnumOption({
    values: ["schedutil", "performance", "powersave", "ondemand"],
    default: "schedutil",
    description: "CPU frequency governor",
  }),
  enableBBR2: mkBoolOption({ default: false, description: "Use BBR congestion control" }),
  enablePSI: mkBoolOption({ default: false, description: "Enable pressure stall information" }),
  transparentHugepages: mkEnumOption({
    values: ["always", "madvise", "never"],
    default: "madvise",
    description: "Transparent hugepage mode",
  }),
  enableMitigations: mkBoolOption({ default: true, description: "Keep CPU vulnerability mitigations on" }),
};

const zram: OptionSchema = {
  enable: mkBoolOption({ default: true, description: "Compressed swap in RAM" }),
  algorithm: mkEnumOption({ values: ["lz4", "zstd", "lzo", "lzo-rle"], default: "zstd", description: "Compression algorithm" }),
  memoryPercent: mkPercentageOption({ default: 25, description: "Share of RAM used for zram" }),
  swappiness: mkIntRangeOption({ min: 0, max: 200, default: 60, description: "vm.swappiness" }),
};

const filesystem: OptionSchema = {
  enable: mkBoolOption({ default: false, description: "Filesystem optimizations" }),
  enableTmpfs: mkBoolOption({ default: false, description: "Mount /tmp as tmpfs" }),
  tmpfsSize: mkMemoryOption({ default: "8G", description: "Size limit of the /tmp tmpfs" }),
  enableFstrim: mkBoolOption({ default: false, description: "Periodic TRIM" }),
  fstrimInterval: mkScheduleOption({ default: "weekly", description: "fstrim timer schedule" }),
  enableNocow: mkBoolOption({ default: false, description: "Disable copy-on-write for database and VM directories" }),
};

const backup: OptionSchema = {
  schedule: mkScheduleOption({ default: "weekly", description: "Backup timer schedule" }),
  repository: mkPathOption({ default: "/var/backup/system", description: "Backup repository location" }),
  paths: mkStringListOption({ default: ["/home", "/etc"], description: "Paths to back up", example: ["/home", "/etc"] }),
  excludes: mkStringListOption({ description: "Glob patterns excluded from backups", example: ["*.tmp"] }),
  retention: {
    keepDaily: mkIntRangeOption({ min: 0, max: 366, default: 7, description: "Daily snapshots to keep" }),
    keepWeekly: mkIntRangeOption({ min: 0, max: 520, default: 4, description: "Weekly snapshots to keep" }),
    keepMonthly: mkIntRangeOption({ min: 0, max: 1200, default: 6, description: "Monthly snapshots to keep" }),
  },
};

const security: OptionSchema = {
  profile: mkEnumOption({ values: ["minimal", "standard", "hardened"], default: "standard", description: "Hardening level" }),
  enableSystemdHardening: mkBoolOption({ default: true, description: "Sandbox systemd services" }),
  enableKernelHardening: mkBoolOption({ default: true, description: "Kernel hardening sysctls" }),
  enableAppArmor: mkBoolOption({ default: false, description: "AppArmor mandatory access control" }),
  rateLimit: {
    synFlood: mkRateLimitOptions({ limitDefault: "1/s", burstDefault: 3 }),
    portScan: mkRateLimitOptions({ limitDefault: "1/s", burstDefault: 2 }),
  },
};

const maintenance: OptionSchema = {
  garbageCollection: {
    schedule: mkScheduleOption({ default: "weekly", description: "Store garbage collection schedule" }),
    keepDays: mkIntRangeOption({ min: 1, max: 365, default: 7, description: "Delete generations older than this many days" }),
    keepGenerations: mkIntRangeOption({ min: 1, max: 100, default: 5, description: "Generations always kept" }),
  },
  autoUpdate: {
    enable: mkBoolOption({ default: false, description: "Unattended system upgrades" }),
    schedule: mkScheduleOption({ default: "weekly", description: "Upgrade schedule" }),
    allowReboot: mkBoolOption({ default: false, description: "Reboot after an upgrade inside the reboot window" }),
    rebootWindow: mkTimeWindowOptions({ description: "Reboot window" }),
  },
  monitoring: {
    diskSpaceThreshold: mkPercentageOption({ default: 80, description: "Disk usage alert threshold" }),
    memoryPressureThreshold: mkPercentageOption({ default: 10, description: "Memory pressure alert threshold" }),
    enableSmartMonitoring: mkBoolOption({ default: false, description: "smartd disk health monitoring" }),
  },
};

const network: OptionSchema = {
  privateRanges: mkStringListOption({ description: "Networks treated as trusted by the firewall", example: ["192.168.0.0/16"] }),
  dockerBridge: mkNetworkOption({ default: "172.17.0.0/16", description: "Docker default bridge network" }),
};

function serviceOptions(name: string, description: string, extra: OptionSchema = {}): OptionSchema {
  return { enable: mkServiceEnableOption(name, description), ...extra };
}

const services: OptionSchema = {
  networking: serviceOptions("networking", "NetworkManager and base network stack"),
  firewall: serviceOptions("firewall", "nftables packet filter"),
  openssh: serviceOptions("openssh", "OpenSSH daemon", {
    port: mkPortOption({ default: 22, description: "SSH listen port", example: 2222 }),
  }),
  docker: serviceOptions("docker", "Container runtime"),
  backup: serviceOptions("backup", "Scheduled backups"),
  monitoring: serviceOptions("monitoring", "Disk space and memory pressure checks"),
  pipewire: serviceOptions("pipewire", "PipeWire media server"),
  fail2ban: serviceOptions("fail2ban", "Intrusion prevention", {
    maxRetry: mkIntRangeOption({ min: 1, max: 100, default: 3, description: "Failures before a ban" }),
    findTime: mkIntOption({ default: 600, description: "Window in seconds in which failures are counted", example: 300 }),
  }),
};

export const systemOptions: OptionSchema = {
  performance: { kernel, zram, filesystem },
  desktop: { enable: mkBoolOption({ default: false, description: "GNOME desktop with GDM" }) },
  docker: {
    profile: mkEnumOption({ values: ["minimal", "development", "production"], default: "minimal", description: "Docker daemon preset" }),
  },
  backup,
  security,
  maintenance,
  network,
  services,
};
