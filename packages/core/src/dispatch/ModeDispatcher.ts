import { ConfigurationError, checkModeSchema } from '@srxprobe/shared';
import type { CheckMode, EvaluationOutcome } from '@srxprobe/shared';
import type { CheckContext } from '../checks/CheckContext.js';
import { checkSessionUsage } from '../checks/sessions.js';
import { checkNodeMetric } from '../checks/nodes.js';
import {
  checkInterfaceList,
  checkInterfaceStatus,
  checkInterfaceStatusDetail,
} from '../checks/interfaces.js';

export function parseMode(value: string): CheckMode {
  const result = checkModeSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}

/** Catalog entry a mode reads and reports against. */
export function metricIdForMode(mode: CheckMode): string {
  switch (mode) {
    case 'interface_status':
    case 'interface_status_detail':
    case 'interface_list':
      return 'interface_status';
    default:
      return mode;
  }
}

function assertNever(mode: never): never {
  throw new ConfigurationError([`no check routine for mode ${String(mode)}`]);
}

export function dispatchCheck(ctx: CheckContext): Promise<EvaluationOutcome> {
  const mode = ctx.request.mode;
  switch (mode) {
    case 'cp_sessions':
    case 'flow_sessions':
      return checkSessionUsage(ctx, mode);
    case 'cpu_load_re':
    case 'cpu_load_fpc':
    case 'memory_fpc':
    case 'memory_re':
    case 'temperature':
      return checkNodeMetric(ctx, mode);
    case 'interface_status':
      return checkInterfaceStatus(ctx);
    case 'interface_status_detail':
      return checkInterfaceStatusDetail(ctx);
    case 'interface_list':
      return checkInterfaceList(ctx);
    default:
      return assertNever(mode);
  }
}
