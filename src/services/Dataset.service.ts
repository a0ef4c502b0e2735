import "reflect-metadata";
import { injectable, inject } from "inversify";
import { Dataset, DatasetClass, DatasetSummary, DatasetInput } from "../interfaces/dataset.interface";
import { DATASET_STORAGE, DatasetStorage, DatasetWriter } from "../interfaces/datasetStorage.interface";
import { completenessIssues, validateDataset } from "../utils/datasetValidation";
import { ForbiddenError, NotFoundError, StorageError, ValidationIssue } from "../utils/errors";

export type EditOptions = {
  /** Only go ahead if this user is the dataset's author when the unit of work runs. */
  requireAuthor?: string;
};

@injectable()
export default class DatasetService {
  constructor(@inject(DATASET_STORAGE) private readonly storage: DatasetStorage) { }

  private static async insertClasses(tx: DatasetWriter, datasetId: string, input: DatasetInput) {
    for (const cls of input.classes) {
      const classId = await tx.insertClass({
        name: cls.name,
        description: cls.description,
        dataset: datasetId,
      });
      await tx.insertMembers(classId, cls.recordings);
    }
  }

  // NotFoundError and ForbiddenError are ours; everything else coming out of a unit of work is a storage failure.
  private async unitOfWork<T>(what: string, work: (tx: DatasetWriter) => Promise<T>): Promise<T> {
    try {
      return await this.storage.transaction(work);
    } catch (err) {
      if (err instanceof NotFoundError || err instanceof ForbiddenError) throw err;
      console.error(`${what} failed, unit of work aborted:`, err);
      throw new StorageError(`${what} failed`, err);
    }
  }

  /** Validates `input` and stores it as a new dataset owned by `authorId`. Returns the new dataset id. */
  async create(input: unknown, authorId: string): Promise<string> {
    const doc = validateDataset(input);

    return this.unitOfWork("Create dataset", async (tx) => {
      const datasetId = await tx.insertDataset({
        name: doc.name,
        description: doc.description,
        public: doc.public,
        author: authorId,
      });
      await DatasetService.insertClasses(tx, datasetId, doc);
      return datasetId;
    });
  }

  /**
   * Replaces the dataset's fields and its whole set of classes.
   * Class ids are regenerated, so they are not stable across updates.
   */
  async update(datasetId: string, input: unknown, authorId: string, options: EditOptions = {}): Promise<void> {
    const doc = validateDataset(input);

    await this.unitOfWork("Update dataset", async (tx) => {
      if (options.requireAuthor !== undefined) {
        const row = await tx.findDataset(datasetId);
        if (!row) throw new NotFoundError();
        if (row.author !== options.requireAuthor) throw new ForbiddenError();
      }

      const matched = await tx.updateDataset(datasetId, {
        name: doc.name,
        description: doc.description,
        public: doc.public,
        author: authorId,
      });
      if (matched === 0) throw new NotFoundError();

      await tx.deleteClasses(datasetId);
      await DatasetService.insertClasses(tx, datasetId, doc);
    });
  }

  /** Full dataset with classes and recordings, or null when there is no such dataset. */
  async get(datasetId: string): Promise<Dataset | null> {
    return this.storage.read(async (reader) => {
      const row = await reader.findDataset(datasetId);
      if (!row) return null;

      // one at a time: a session runs one operation at once
      const classes: DatasetClass[] = [];
      for (const c of await reader.findClasses(row.id)) {
        classes.push({
          id: c.id,
          name: c.name,
          description: c.description,
          recordings: await reader.findMembers(c.id),
        });
      }

      return { ...row, classes };
    });
  }

  async getByOwner(authorId: string, publicOnly = true): Promise<DatasetSummary[]> {
    return this.storage.findByAuthor(authorId, publicOnly);
  }

  // Deleting a dataset that doesn't exist is fine.
  async delete(datasetId: string, options: EditOptions = {}): Promise<void> {
    await this.unitOfWork("Delete dataset", async (tx) => {
      if (options.requireAuthor !== undefined) {
        const row = await tx.findDataset(datasetId);
        if (!row) return;
        if (row.author !== options.requireAuthor) throw new ForbiddenError();
      }
      await tx.deleteDataset(datasetId);
    });
  }

  // Whether the stored dataset can be used for further processing.
  async checkComplete(datasetId: string): Promise<{ complete: boolean; issues: ValidationIssue[] }> {
    const dataset = await this.get(datasetId);
    if (!dataset) throw new NotFoundError();

    const issues = completenessIssues(dataset);
    return { complete: issues.length === 0, issues };
  }

}
