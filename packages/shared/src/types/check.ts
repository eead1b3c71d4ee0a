export type CheckStatus = 'OK' | 'WARNING' | 'CRITICAL' | 'UNKNOWN';

/**
 * Statuses that take part in worst-wins aggregation. UNKNOWN is reported
 * on its own and is never compared with the others.
 */
export type RankedStatus = Exclude<CheckStatus, 'UNKNOWN'>;

export type CheckMode =
  | 'cp_sessions'
  | 'flow_sessions'
  | 'cpu_load_re'
  | 'cpu_load_fpc'
  | 'memory_fpc'
  | 'memory_re'
  | 'temperature'
  | 'interface_status'
  | 'interface_status_detail'
  | 'interface_list';

export type SnmpVersion = '1' | '2c';

export interface CheckRequest {
  readonly target: string;
  readonly community: string;
  readonly mode: CheckMode;
  readonly interfaceName?: string;
  readonly port: number;
  readonly timeoutMs: number;
  readonly version: SnmpVersion;
}

export interface EvaluationOutcome {
  status: CheckStatus;
  message: string;
  perfdata: string;
}

export interface InterfaceStatus {
  adminCode: number;
  operCode: number;
}
