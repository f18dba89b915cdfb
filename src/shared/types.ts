export type Platform = 'linux' | 'darwin' | 'win32';

export interface AgentIdentity {
  readonly id: string;
  readonly kind: string;
  readonly description: string;
}

export interface PidRecord {
  ownerKey: string;
  pid: number;
}

export type MonitorName = 'event_monitor' | 'agent_monitor';

export type LaunchStrategy = 'screen' | 'tmux' | 'background' | 'windows-console';

export type MultiplexerStrategy = Extract<LaunchStrategy, 'screen' | 'tmux'>;

export interface LaunchSpec {
  name: MonitorName;
  command: string;
  args: string[];
}

export type LaunchHandle =
  | { strategy: MultiplexerStrategy; name: MonitorName; session: string; pid: number | null }
  | { strategy: 'background' | 'windows-console'; name: MonitorName; pid: number | null };

export type AgentState = 'active' | 'idle' | 'busy' | 'waiting' | 'error' | 'offline';

export interface MonitorReport {
  strategy: LaunchStrategy | null;
  launched: LaunchHandle[];
  stale: number[];
  advisory: boolean;
}

export interface MonitorStatus {
  name: MonitorName;
  pid: number | null;
  alive: boolean;
}

export function isMultiplexer(strategy: LaunchStrategy): strategy is MultiplexerStrategy {
  return strategy === 'screen' || strategy === 'tmux';
}
