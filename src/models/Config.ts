/**
 * Configuration models for gatewatch
 */

/**
 * Operational parameters for one run. Loaded once before the first cycle.
 */
export interface MonitorParameters {
  /** Human-readable gateway name */
  vpnName: string;
  /** Gateway URL or IP address */
  vpnAddress: string;
  username: string;
  password: string;
  /** Path of the targets file, reloaded every cycle */
  targetsFile: string;
  /** Number of cycles to run; negative means run until interrupted */
  cycles: number;
  /** Seconds between cycles */
  delaySeconds: number;
  /** Path of the append-only result log */
  datalogFile: string;
  /** Suppress alert pulses */
  quiet: boolean;
  /** Echo requests per target probe */
  targetPings: number;
}

/**
 * Tunables for the interactive VPN client session
 */
export interface SessionConfig {
  /** Shell spawned to host the VPN client */
  shell: string;
  shellArgs: string[];
  /** Extra environment for the shell */
  environment: Record<string, string>;
  /** Generic shell prompt */
  shellPrompt: string;
  /** Command line that starts the VPN client CLI */
  toolCommand: string;
  /** Prompt printed by the VPN client CLI */
  toolPrompt: string;
  /** Process names terminated before a session is opened */
  preemptProcesses: string[];
  /** Client process names terminated when a session is torn down */
  toolProcesses: string[];
  /** Delay before every line sent to the client, in milliseconds */
  commandDelay: number;
  /** Bound on every wait for expected output, in milliseconds */
  expectTimeout: number;
  /** Whether usernames and passwords may appear in debug logs */
  logCredentials: boolean;
}

/**
 * Tunables for the result log writer
 */
export interface SinkConfig {
  /** Total write attempts while the file is held by another process */
  maxAttempts: number;
  /** Fixed wait between attempts, in milliseconds */
  retryDelay: number;
}

/**
 * Probe tunables used by the orchestrator
 */
export interface ProbeConfig {
  /** Echo requests sent to the gateway */
  gatewayPings: number;
  /** Per echo request timeout, in milliseconds */
  pingTimeout: number;
  /** Web probe timeout, in milliseconds */
  webTimeout: number;
}
