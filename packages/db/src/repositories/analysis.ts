import type { Db } from '../client.js';
import { AnalysisJobSchema, AnalysisResultSchema } from '../entities.js';
import type { AnalysisJob, AnalysisResult } from '../entities.js';
import { BaseRepository } from './base.js';

export class AnalysisJobRepository extends BaseRepository<AnalysisJob> {
  constructor(db: Db) {
    super(db, 'analysis_jobs', AnalysisJobSchema, Object.keys(AnalysisJobSchema.shape));
  }

  /**
   * Task ids recorded on the job, in order
   */
  taskIdsOf(job: AnalysisJob): string[] {
    return job.taskIds.length > 0 ? job.taskIds.split(',') : [];
  }
}

export class AnalysisResultRepository extends BaseRepository<AnalysisResult> {
  constructor(db: Db) {
    super(db, 'analysis_results', AnalysisResultSchema, Object.keys(AnalysisResultSchema.shape));
  }

  getByJob(analysisJobId: number): AnalysisResult[] {
    return this.getBy({ analysisJobId });
  }
}
