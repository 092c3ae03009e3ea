import pino from 'pino';
import type { AnalysisInput, AnalysisResultDraft, AnalysisWorker, WorkerSpec } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

type EchoSpec = Extract<WorkerSpec, { kind: 'echo' }>;

/**
 * Returns one draft built from static config; no model call
 */
export function createEchoWorker(spec: EchoSpec): AnalysisWorker {
  return {
    async analyze(input: AnalysisInput): Promise<AnalysisResultDraft[]> {
      logger.debug({ event: 'analysis.echo', sectionId: input.sectionId, analysisJobId: input.analysisJobId }, 'Echo worker');
      return [
        {
          analysisJobId: input.analysisJobId,
          experimentId: input.experimentId,
          promptTemplateId: null,
          content: spec.content,
          justification: spec.justification ?? null,
          selfConfidence: spec.selfConfidence ?? null,
        },
      ];
    },
  };
}
