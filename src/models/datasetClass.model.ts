// src/models/datasetClass.model.ts
import { Schema, model, models, Model, Types } from "mongoose";
import { fitsNameLength, NAME_TOO_LONG } from "../interfaces/dataset.interface";

export interface DatasetClassDoc {
  _id: Types.ObjectId;
  name: string;
  description: string | null;
  dataset: string;
}

const DatasetClassSchema = new Schema<DatasetClassDoc>(
  {
    name: {
      type: String,
      required: true,
      minlength: 1,
      validate: { validator: fitsNameLength, message: NAME_TOO_LONG },
    },
    description: { type: String, default: null },
    dataset: { type: String, ref: "Dataset", required: true, index: true },
  },
  { collection: "dataset_classes", versionKey: false }
);

export const DatasetClass: Model<DatasetClassDoc> =
  models.DatasetClass || model<DatasetClassDoc>("DatasetClass", DatasetClassSchema);
