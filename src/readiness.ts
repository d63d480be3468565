import type { TailEngine } from './engine/engine.js';
import type { PoolHostStats } from './engine/sessionPool.js';

export type ReadinessCheckResult = {
  ok: boolean;
  checks: {
    app: { ok: true };
    engine: {
      ok: boolean;
      sources: number;
      reason?: string;
    };
    pool: {
      hosts: PoolHostStats[];
      waiting: number;
    };
  };
  ts: string;
};

/** Ready once the engine has registered its sources; pool waiters are reported only. */
export function checkReadiness(engine: Pick<TailEngine, 'isReady' | 'listSources' | 'poolStats'>): ReadinessCheckResult {
  const hosts = engine.poolStats();
  const ready = engine.isReady;

  return {
    ok: ready,
    checks: {
      app: { ok: true },
      engine: {
        ok: ready,
        sources: engine.listSources().length,
        ...(ready ? {} : { reason: 'engine_not_started' })
      },
      pool: {
        hosts,
        waiting: hosts.reduce((sum, host) => sum + host.waiting, 0)
      }
    },
    ts: new Date().toISOString()
  };
}
