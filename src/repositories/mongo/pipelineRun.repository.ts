import { IPipelineRun, PipelineRun } from '../../models';
import { NewPipelineRun, PipelineRunRecord, PipelineRunRepository, PipelineRunUpdate } from '../types';

const toRecord = (doc: IPipelineRun): PipelineRunRecord => ({
  id: doc._id,
  runKey: doc.runKey,
  jobName: doc.jobName,
  trigger: doc.trigger,
  tags: doc.tags ?? {},
  status: doc.status,
  stages: doc.stages.map((stage) => ({
    stage: stage.stage,
    rowsIn: stage.rowsIn,
    rowsOut: stage.rowsOut,
    durationMs: stage.durationMs,
  })),
  error: doc.error ?? null,
  startedAt: doc.startedAt,
  completedAt: doc.completedAt ?? null,
});

export class MongoPipelineRunRepository implements PipelineRunRepository {
  /**
   * Inserts the run unless one with the same key exists. The upsert relies on the unique
   * run key index, so two launchers racing on one key produce a single run.
   */
  async createIfAbsent(input: NewPipelineRun): Promise<PipelineRunRecord | null> {
    const result = await PipelineRun.updateOne(
      { runKey: input.runKey },
      { $setOnInsert: { ...input, status: 'started', stages: [], error: null, completedAt: null } },
      { upsert: true }
    );
    if (result.upsertedCount === 0) {
      return null;
    }
    return this.findByRunKey(input.runKey);
  }

  async update(runKey: string, patch: PipelineRunUpdate): Promise<PipelineRunRecord | null> {
    const doc = await PipelineRun.findOneAndUpdate({ runKey }, { $set: patch }, { new: true });
    return doc ? toRecord(doc) : null;
  }

  async findByRunKey(runKey: string): Promise<PipelineRunRecord | null> {
    const doc = await PipelineRun.findOne({ runKey });
    return doc ? toRecord(doc) : null;
  }
}
