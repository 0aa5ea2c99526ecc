import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { PipelineRunStatus, StageResult } from '../repositories/types';

export interface IPipelineRun extends Document<string> {
  _id: string;
  runKey: string;
  jobName: string;
  trigger: string;
  tags: Record<string, string>;
  status: PipelineRunStatus;
  stages: StageResult[];
  error: string | null;
  startedAt: Date;
  completedAt: Date | null;
}

const stageResultSchema = new Schema<StageResult>(
  {
    stage: { type: String, required: true },
    rowsIn: { type: Number, required: true },
    rowsOut: { type: Number, required: true },
    durationMs: { type: Number, required: true },
  },
  { _id: false }
);

const pipelineRunSchema = new Schema<IPipelineRun>(
  {
    _id: { type: String, default: () => uuidv4() },
    runKey: { type: String, required: true },
    jobName: { type: String, required: true },
    trigger: { type: String, required: true },
    tags: { type: Schema.Types.Mixed, default: {} },
    status: {
      type: String,
      enum: ['started', 'success', 'failure'],
      default: 'started',
    },
    stages: { type: [stageResultSchema], default: [] },
    error: { type: String, default: null },
    startedAt: { type: Date, required: true },
    completedAt: { type: Date, default: null },
  },
  { versionKey: false, minimize: false }
);

pipelineRunSchema.index({ runKey: 1 }, { unique: true });

export const PipelineRun = mongoose.model<IPipelineRun>('PipelineRun', pipelineRunSchema);
