import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface IUser extends Document<string> {
  _id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  dateJoined: Date;
}

const userSchema = new Schema<IUser>(
  {
    _id: { type: String, default: () => uuidv4() },
    username: {
      type: String,
      required: true,
      trim: true,
      minlength: 3,
      maxlength: 150,
    },
    email: {
      type: String,
      required: true,
      trim: true,
      lowercase: true,
    },
    firstName: { type: String, default: '', maxlength: 150 },
    lastName: { type: String, default: '', maxlength: 150 },
    isActive: { type: Boolean, default: true },
    dateJoined: { type: Date, default: Date.now },
  },
  { versionKey: false }
);

// Indexes
userSchema.index({ username: 1 }, { unique: true });

export const User = mongoose.model<IUser>('User', userSchema);
