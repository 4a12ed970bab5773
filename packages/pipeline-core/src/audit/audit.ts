import type { Logger } from '../logger';
import type { PipelineBus } from '../pubsub/bus';
import type { PipelineMessage } from '../schemas/types';

export function logAction(log: Logger, message: PipelineMessage) {
  const { id, sender, topic, payload } = message;
  log.debug({ id, sender, topic, payload }, `[AUDIT] ${sender}: ${topic}`);
}

export function attachAudit(bus: PipelineBus, log: Logger): () => void {
  const off = [
    bus.subscribe('stage_started', (msg) => {
      logAction(log, msg);
      log.info({ stage: msg.payload.stage, rows: msg.payload.rows }, 'stage started');
    }),
    bus.subscribe('stage_completed', (msg) => {
      logAction(log, msg);
      log.info({ stage: msg.payload.stage, rows: msg.payload.rows, durationMs: msg.payload.durationMs }, 'stage completed');
    }),
    bus.subscribe('row_classified', (msg) => {
      logAction(log, msg);
      const { symbol, label, known } = msg.payload;
      if (!known) log.warn({ symbol, label }, 'label outside the sector taxonomy');
    }),
    bus.subscribe('row_failed', (msg) => {
      logAction(log, msg);
      log.warn({ symbol: msg.payload.symbol, error: msg.payload.error }, 'classification failed');
    }),
  ];
  return () => off.forEach((fn) => fn());
}
