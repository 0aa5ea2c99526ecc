import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { SOURCE_TYPES, SourceType } from '../repositories/types';

export interface IDataSource extends Document<string> {
  _id: string;
  name: string;
  sourceType: SourceType;
  connectionString: string;
  isActive: boolean;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

/** Collation used for every name comparison so uniqueness ignores case. */
export const NAME_COLLATION = { locale: 'en', strength: 2 } as const;

const dataSourceSchema = new Schema<IDataSource>(
  {
    _id: { type: String, default: () => uuidv4() },
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 100,
    },
    sourceType: {
      type: String,
      required: true,
      enum: SOURCE_TYPES,
    },
    connectionString: { type: String, required: true },
    isActive: { type: Boolean, default: true },
    metadata: { type: Schema.Types.Mixed, default: {} },
  },
  { timestamps: true, versionKey: false, minimize: false }
);

dataSourceSchema.index({ name: 1 }, { unique: true, collation: NAME_COLLATION });
dataSourceSchema.index({ isActive: 1, updatedAt: -1 });

export const DataSource = mongoose.model<IDataSource>('DataSource', dataSourceSchema);
