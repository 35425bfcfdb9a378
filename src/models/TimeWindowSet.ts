import mongoose, { Schema, Document, Types } from 'mongoose';

export interface ITimeWindowEntry {
  _id: Types.ObjectId;
  name: string;
  start: string; // HH:mm or HH:mm:ss
  end: string;
  isActive: boolean;
}

/**
 * All time windows live in one document so that replacing them is a single
 * atomic write and readers always see a complete set.
 */
export interface ITimeWindowSet extends Document {
  key: string;
  version: number;
  windows: ITimeWindowEntry[];
  createdAt: Date;
  updatedAt: Date;
}

export const CURRENT_TIME_WINDOW_SET = 'current';

const timeWindowEntrySchema = new Schema({
  name: {
    type: String,
    required: true,
    trim: true,
  },
  start: {
    type: String,
    required: true,
  },
  end: {
    type: String,
    required: true,
  },
  isActive: {
    type: Boolean,
    default: true,
  },
});

const TimeWindowSetSchema: Schema = new Schema({
  key: {
    type: String,
    required: true,
    unique: true,
    default: CURRENT_TIME_WINDOW_SET,
  },
  version: {
    type: Number,
    required: true,
    default: 0,
  },
  windows: {
    type: [timeWindowEntrySchema],
    default: [],
  },
}, {
  timestamps: true,
});

export const TimeWindowSet = mongoose.model<ITimeWindowSet>('TimeWindowSet', TimeWindowSetSchema);
