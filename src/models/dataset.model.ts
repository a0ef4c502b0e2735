// src/models/dataset.model.ts
import { Schema, model, models, Model } from "mongoose";
import { fitsNameLength, NAME_TOO_LONG } from "../interfaces/dataset.interface";
import { randomUUID } from "crypto";

export interface DatasetDoc {
  _id: string;
  name: string;
  description: string | null;
  public: boolean;
  author: string;
  created: Date;
}

const DatasetSchema = new Schema<DatasetDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    name: {
      type: String,
      required: true,
      minlength: 1,
      validate: { validator: fitsNameLength, message: NAME_TOO_LONG },
    },
    description: { type: String, default: null },
    public: { type: Boolean, required: true },
    author: { type: String, required: true, index: true },
    created: { type: Date, default: () => new Date(), immutable: true },
  },
  { collection: "datasets", versionKey: false }
);

export const Dataset: Model<DatasetDoc> = models.Dataset || model<DatasetDoc>("Dataset", DatasetSchema);
