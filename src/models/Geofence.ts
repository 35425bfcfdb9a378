import mongoose, { Schema, Document } from 'mongoose';

// GeoJSON Polygon, positions are [longitude, latitude]
export interface IPolygon {
  type: 'Polygon';
  coordinates: number[][][];
}

export interface IGeofence extends Document {
  name: string;
  polygon: IPolygon;
  marginMeters: number;
  priority: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const polygonSchema = new Schema({
  type: {
    type: String,
    enum: ['Polygon'],
    required: true,
  },
  coordinates: {
    type: [[[Number]]],
    required: true,
  },
}, { _id: false });

const GeofenceSchema: Schema = new Schema({
  name: {
    type: String,
    required: true,
    unique: true,
    trim: true,
  },
  polygon: {
    type: polygonSchema,
    required: true,
  },
  marginMeters: {
    type: Number,
    required: true,
    min: 0,
    default: 0,
  },
  priority: {
    type: Number,
    default: 0,
  },
  isActive: {
    type: Boolean,
    default: true,
    index: true,
  },
}, {
  timestamps: true,
});

export const GeofenceModel = mongoose.model<IGeofence>('Geofence', GeofenceSchema);
