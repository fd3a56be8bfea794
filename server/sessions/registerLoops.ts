/**
 * Builds the acquisition loops described by the server configuration
 */

import type { ServerConfig } from '../config.js';
import type { LoopManager, TimebaseControl } from './LoopManager.js';
import type { Result } from '../../shared/types.js';
import type { Scheduler } from '../acquisition/scheduler.js';
import { logRate } from '../acquisition/RateReporter.js';
import { createSiglentSds, createSdsSource, type SiglentSds } from '../devices/drivers/siglent-sds.js';
import { createRequestPacer, type RequestPacer } from '../devices/request-pacer.js';
import { createTcpTransport, type SocketFactory } from '../devices/transports/tcp.js';
import { createSimulatedScope, loadSimulationConfigFromEnv } from '../devices/simulation/index.js';
import { createFmSineSource } from '../sources/fm-sine.js';

export interface RegisterLoopsOptions {
  scheduler: Scheduler;
  env?: NodeJS.ProcessEnv;
  /** Socket factory for scope connections (tests inject an in-process instrument) */
  connect?: SocketFactory;
}

// setTimebase that also re-arms the pacer
function timebaseControl(scope: SiglentSds, pacer: RequestPacer): TimebaseControl {
  return {
    async setTimebase(secondsPerDivision: number): Promise<Result<void, Error>> {
      const result = await scope.setTimebase(secondsPerDivision);
      if (result.ok) pacer.invalidate();
      return result;
    },
  };
}

/** Adds one loop per configured source; returns the ids added */
export function registerLoops(manager: LoopManager, config: ServerConfig, options: RegisterLoopsOptions): string[] {
  const { scheduler, env = process.env, connect } = options;
  const loopConfig = {
    capacity: config.maxQueueSize,
    addTimestamp: config.addTimestamp,
    yields: config.yields,
    reportRate: config.reportRate,
    onRate: logRate,
    scheduler,
  };
  const ids: string[] = [];

  if (config.source === 'fm-sine') {
    const source = createFmSineSource({ scheduler });
    ids.push(manager.addLoop(source, { ...loopConfig, id: 'fm-sine' }).id);
    return ids;
  }

  const addScope = (id: string, scope: SiglentSds) => {
    const pacer = createRequestPacer(scope, { scheduler, pacingFactor: config.pacingFactor });
    const source = createSdsSource({ scope, pacer, channels: config.channels, name: id });
    manager.addLoop(source, { ...loopConfig, id, timebase: timebaseControl(scope, pacer) });
    ids.push(id);
  };

  if (config.simulate) {
    const { scope } = createSimulatedScope({
      ...loadSimulationConfigFromEnv(env),
      divisions: config.divisions,
    });
    addScope('sds-sim', scope);
    return ids;
  }

  for (const { host, port } of config.scopes) {
    const transport = createTcpTransport({ host, port, timeoutMs: config.scpiTimeoutMs, connect });
    addScope(`sds-${host}:${port}`, createSiglentSds(transport, { divisions: config.divisions }));
  }
  return ids;
}
