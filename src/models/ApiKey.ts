import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface IApiKey extends Document<string> {
  _id: string;
  name: string;
  key: string;
  user: string;
  isActive: boolean;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const apiKeySchema = new Schema<IApiKey>(
  {
    _id: { type: String, default: () => uuidv4() },
    name: {
      type: String,
      required: true,
      trim: true,
      minlength: 3,
      maxlength: 100,
    },
    // Issued once at creation and never rewritten
    key: { type: String, required: true, immutable: true },
    user: { type: String, ref: 'User', required: true },
    isActive: { type: Boolean, default: true },
    expiresAt: { type: Date, default: null },
    lastUsedAt: { type: Date, default: null },
  },
  { timestamps: true, versionKey: false }
);

apiKeySchema.index({ key: 1 }, { unique: true });
apiKeySchema.index({ user: 1, createdAt: -1 });

export const ApiKey = mongoose.model<IApiKey>('ApiKey', apiKeySchema);
