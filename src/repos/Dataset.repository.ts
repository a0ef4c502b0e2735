// src/repos/Dataset.repository.ts
import "reflect-metadata";
import { injectable } from "inversify";
import mongoose, { ClientSession, Types } from "mongoose";
import { Dataset, DatasetDoc } from "../models/dataset.model";
import { DatasetClass, DatasetClassDoc } from "../models/datasetClass.model";
import { DatasetClassMember } from "../models/datasetClassMember.model";
import { DatasetSummary } from "../interfaces/dataset.interface";
import {
  ClassRow,
  DatasetFields,
  DatasetReader,
  DatasetRow,
  DatasetStorage,
  DatasetWriter,
  NewClassRow,
  NewDatasetRow,
} from "../interfaces/datasetStorage.interface";

function toSummary(doc: DatasetDoc): DatasetSummary {
  return {
    id: doc._id,
    name: doc.name,
    description: doc.description ?? null,
    author: doc.author,
    created: doc.created,
  };
}

type TransactionOptions = Parameters<ClientSession["startTransaction"]>[0];

// With a session, every query runs in that session's transaction.
export class MongoDatasetReader implements DatasetReader {
  constructor(protected readonly session: ClientSession | null) { }

  async findDataset(id: string): Promise<DatasetRow | null> {
    const doc = await Dataset.findById(id).session(this.session).lean<DatasetDoc | null>();
    if (!doc) return null;
    return { ...toSummary(doc), public: doc.public };
  }

  async findClasses(datasetId: string): Promise<ClassRow[]> {
    const docs = await DatasetClass.find({ dataset: datasetId })
      .session(this.session)
      .lean<DatasetClassDoc[]>();
    return docs.map((c) => ({
      id: c._id.toString(),
      name: c.name,
      description: c.description ?? null,
      dataset: c.dataset,
    }));
  }

  async findMembers(classId: string): Promise<string[]> {
    const docs = await DatasetClassMember.find({ class: classId })
      .select("mbid")
      .session(this.session)
      .lean<{ mbid: string }[]>();
    return docs.map((m) => m.mbid);
  }
}

// Mongo has no FK cascade, so members go first, then classes, then the dataset.
export class MongoDatasetWriter extends MongoDatasetReader implements DatasetWriter {
  constructor(protected readonly session: ClientSession) {
    super(session);
  }

  async insertDataset(row: NewDatasetRow) {
    const doc = new Dataset({
      name: row.name,
      description: row.description,
      public: row.public,
      author: row.author,
    });
    await doc.save({ session: this.session });
    return doc._id;
  }

  async updateDataset(id: string, fields: DatasetFields) {
    const res = await Dataset.updateOne(
      { _id: id },
      { $set: fields },
      { session: this.session }
    ).exec();
    return res.matchedCount;
  }

  async insertClass(row: NewClassRow) {
    const doc = new DatasetClass({
      name: row.name,
      description: row.description,
      dataset: row.dataset,
    });
    await doc.save({ session: this.session });
    return doc._id.toString();
  }

  async insertMembers(classId: string, mbids: string[]) {
    if (mbids.length === 0) return;
    const cls = new Types.ObjectId(classId);
    await DatasetClassMember.insertMany(
      mbids.map((mbid) => ({ class: cls, mbid })),
      { session: this.session }
    );
  }

  async deleteClasses(datasetId: string) {
    const classes = await DatasetClass.find({ dataset: datasetId })
      .select("_id")
      .session(this.session)
      .lean<Pick<DatasetClassDoc, "_id">[]>();
    const ids = classes.map((c) => c._id);

    await DatasetClassMember.deleteMany({ class: { $in: ids } }, { session: this.session }).exec();
    await DatasetClass.deleteMany({ dataset: datasetId }, { session: this.session }).exec();
  }

  async deleteDataset(id: string) {
    await this.deleteClasses(id);
    const res = await Dataset.deleteOne({ _id: id }, { session: this.session }).exec();
    return res.deletedCount;
  }
}

@injectable()
export default class DatasetRepository implements DatasetStorage {
  private readonly direct = new MongoDatasetReader(null);

  findDataset(id: string) {
    return this.direct.findDataset(id);
  }

  findClasses(datasetId: string) {
    return this.direct.findClasses(datasetId);
  }

  findMembers(classId: string) {
    return this.direct.findMembers(classId);
  }

  async findByAuthor(author: string, publicOnly: boolean): Promise<DatasetSummary[]> {
    const filter: { author: string; public?: boolean } = { author };
    if (publicOnly) filter.public = true;
    const docs = await Dataset.find(filter).lean<DatasetDoc[]>();
    return docs.map(toSummary);
  }

  // Read-only transaction, so every query sees the same snapshot.
  read<T>(work: (reader: DatasetReader) => Promise<T>): Promise<T> {
    return this.inTransaction(
      { readConcern: { level: "snapshot" } },
      (session) => work(new MongoDatasetReader(session))
    );
  }

  transaction<T>(work: (tx: DatasetWriter) => Promise<T>): Promise<T> {
    return this.inTransaction(undefined, (session) => work(new MongoDatasetWriter(session)));
  }

  // Not withTransaction(): that retries on transient errors.
  private async inTransaction<T>(
    options: TransactionOptions,
    work: (session: ClientSession) => Promise<T>
  ): Promise<T> {
    const session = await mongoose.startSession();
    try {
      session.startTransaction(options);
      const result = await work(session);
      await session.commitTransaction();
      return result;
    } catch (err) {
      if (session.inTransaction()) {
        try {
          await session.abortTransaction();
        } catch (abortErr) {
          console.error("Failed to abort dataset transaction", abortErr);
        }
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

}
