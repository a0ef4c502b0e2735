import { DatasetSummary } from "./dataset.interface";

export const DATASET_STORAGE = Symbol.for("DatasetStorage");

export interface DatasetRow extends DatasetSummary {
  public: boolean;
}

export interface ClassRow {
  id: string;
  name: string;
  description: string | null;
  dataset: string;
}

export type NewDatasetRow = Omit<DatasetRow, "id" | "created">;
export type DatasetFields = Pick<DatasetRow, "name" | "description" | "public" | "author">;
export type NewClassRow = Omit<ClassRow, "id">;

// Read statements. Those handed to `read()` or `transaction()` all see one snapshot.
export interface DatasetReader {
  findDataset(id: string): Promise<DatasetRow | null>;
  findClasses(datasetId: string): Promise<ClassRow[]>;
  findMembers(classId: string): Promise<string[]>;
}

// Write statements. Only valid inside the unit of work that handed them out.
export interface DatasetWriter extends DatasetReader {
  insertDataset(row: NewDatasetRow): Promise<string>;
  /** Returns the number of dataset rows matched (0 or 1). */
  updateDataset(id: string, fields: DatasetFields): Promise<number>;
  insertClass(row: NewClassRow): Promise<string>;
  insertMembers(classId: string, mbids: string[]): Promise<void>;
  /** Removes every class of the dataset together with its members. */
  deleteClasses(datasetId: string): Promise<void>;
  /** Removes the dataset, its classes and their members. Returns the number of dataset rows removed. */
  deleteDataset(id: string): Promise<number>;
}

export interface DatasetStorage extends DatasetReader {
  findByAuthor(author: string, publicOnly: boolean): Promise<DatasetSummary[]>;

  /** Runs `work` against a single consistent snapshot; writes committed meanwhile are not seen. */
  read<T>(work: (reader: DatasetReader) => Promise<T>): Promise<T>;

  /**
   * Runs `work` as a single unit of work: committed when it resolves,
   * aborted when it throws. Errors thrown by `work` propagate unchanged.
   */
  transaction<T>(work: (tx: DatasetWriter) => Promise<T>): Promise<T>;
}
