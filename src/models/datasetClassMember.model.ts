// src/models/datasetClassMember.model.ts
import { Schema, model, models, Model, Types } from "mongoose";
import { MBID_PATTERN } from "../interfaces/dataset.interface";

export interface DatasetClassMemberDoc {
  class: Types.ObjectId;
  mbid: string;
}

const DatasetClassMemberSchema = new Schema<DatasetClassMemberDoc>(
  {
    class: { type: Schema.Types.ObjectId, ref: "DatasetClass", required: true, index: true },
    mbid: { type: String, required: true, match: MBID_PATTERN },
  },
  { collection: "dataset_class_members", versionKey: false }
);

export const DatasetClassMember: Model<DatasetClassMemberDoc> =
  models.DatasetClassMember || model<DatasetClassMemberDoc>("DatasetClassMember", DatasetClassMemberSchema);
