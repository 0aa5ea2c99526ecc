import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { JOB_STATUSES, JobStatus } from '../repositories/types';

export interface IEtlJob extends Document<string> {
  _id: string;
  name: string;
  status: JobStatus;
  dataSource: string;
  startedAt: Date | null;
  completedAt: Date | null;
  recordsProcessed: number;
  errorMessage: string;
  recoveryAttempts: number;
  configuration: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const etlJobSchema = new Schema<IEtlJob>(
  {
    _id: { type: String, default: () => uuidv4() },
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 100,
    },
    status: {
      type: String,
      enum: JOB_STATUSES,
      default: 'pending',
    },
    dataSource: { type: String, ref: 'DataSource', required: true },
    startedAt: { type: Date, default: null },
    completedAt: { type: Date, default: null },
    recordsProcessed: { type: Number, default: 0, min: 0 },
    errorMessage: { type: String, default: '' },
    recoveryAttempts: { type: Number, default: 0, min: 0 },
    configuration: { type: Schema.Types.Mixed, default: {} },
  },
  { timestamps: true, versionKey: false, minimize: false }
);

// Indexes
etlJobSchema.index({ createdAt: -1 });
etlJobSchema.index({ status: 1, startedAt: 1 });
etlJobSchema.index({ dataSource: 1 });
etlJobSchema.index({ status: 1, completedAt: -1 });

export const EtlJob = mongoose.model<IEtlJob>('EtlJob', etlJobSchema);
