import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { Labels, METRIC_TYPES, MetricType } from '../repositories/types';

export interface IMetricData extends Document<string> {
  _id: string;
  metricName: string;
  metricValue: number;
  metricType: MetricType;
  labels: Labels;
  timestamp: Date;
  createdAt: Date;
}

const metricDataSchema = new Schema<IMetricData>(
  {
    _id: { type: String, default: () => uuidv4() },
    metricName: {
      type: String,
      required: true,
      maxlength: 100,
    },
    metricValue: { type: Number, required: true },
    metricType: {
      type: String,
      enum: METRIC_TYPES,
      default: 'gauge',
    },
    labels: { type: Schema.Types.Mixed, default: {} },
    timestamp: { type: Date, default: Date.now, immutable: true },
  },
  // Rows are append-only, so only the creation time is tracked
  { timestamps: { createdAt: true, updatedAt: false }, versionKey: false, minimize: false }
);

metricDataSchema.index({ metricName: 1, timestamp: -1 });
metricDataSchema.index({ timestamp: -1 });

export const MetricData = mongoose.model<IMetricData>('MetricData', metricDataSchema);
