import type { CheckMode, CheckStatus, RankedStatus, SnmpVersion } from './types/index.js';

export const PROBE_VERSION = '1.0.0';

export const DEFAULT_SNMP_PORT = 161;
export const DEFAULT_TIMEOUT = '5s';
export const DEFAULT_COMMUNITY = 'public';
export const DEFAULT_SNMP_VERSION: SnmpVersion = '2c';
export const DEFAULT_MAX_REPETITIONS = 20;

export const CHECK_MODES = [
  'cp_sessions',
  'flow_sessions',
  'cpu_load_re',
  'cpu_load_fpc',
  'memory_fpc',
  'memory_re',
  'temperature',
  'interface_status',
  'interface_status_detail',
  'interface_list',
] as const satisfies readonly CheckMode[];

/** Modes that cannot run without an interface name. */
export const INTERFACE_MODES: readonly CheckMode[] = ['interface_status', 'interface_status_detail'];

export const STATUS_RANK: Readonly<Record<RankedStatus, number>> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
};

export const EXIT_CODES: Readonly<Record<CheckStatus, number>> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
};

export const CONFIGURATION_ERROR_EXIT_CODE = 3;

// IF-MIB ifAdminStatus / ifOperStatus
export const IF_STATUS = {
  up: 1,
  down: 2,
  testing: 3,
  unknown: 4,
  dormant: 5,
  notPresent: 6,
  lowerLayerDown: 7,
} as const;

