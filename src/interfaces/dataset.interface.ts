// src/interfaces/dataset.interface.ts
import { z } from "zod";

// MusicBrainz recording id
export const MBID_PATTERN = /^[a-fA-F0-9]{8}-[a-fA-F0-9]{4}-[a-fA-F0-9]{4}-[a-fA-F0-9]{4}-[a-fA-F0-9]{12}$/;

export const NAME_MAX_LENGTH = 100;
export const NAME_TOO_LONG = `String must contain at most ${NAME_MAX_LENGTH} character(s)`;

// Counts code points, not UTF-16 units: an emoji is one character.
export function fitsNameLength(value: string) {
  return [...value].length <= NAME_MAX_LENGTH;
}

const NameString = z.string().min(1).refine(fitsNameLength, NAME_TOO_LONG);

const ClassObject = z.object({
  name: NameString,
  description: z.string().nullable().optional().default(null),
  recordings: z.array(z.string().regex(MBID_PATTERN, "Must be a recording MBID")),
});

// Basic structure of a submitted dataset.
export const BaseDatasetSchema = z.object({
  name: NameString,
  description: z.string().nullable().optional().default(null),
  public: z.boolean(),
  classes: z.array(ClassObject),
});

// What a dataset needs before it can be used for further processing:
// at least two classes, at least two recordings in each.
export const CompleteDatasetSchema = BaseDatasetSchema.extend({
  classes: z
    .array(
      ClassObject.extend({
        recordings: ClassObject.shape.recordings.min(2, "Each class needs at least two recordings"),
      })
    )
    .min(2, "At least two classes are required"),
});

export type DatasetVariant = "base" | "complete";

export type DatasetInput = z.infer<typeof BaseDatasetSchema>;

export interface DatasetClass {
  id: string;
  name: string;
  description: string | null;
  recordings: string[];
}

export interface DatasetSummary {
  id: string;
  name: string;
  description: string | null;
  author: string;
  created: Date;
}

export interface Dataset extends DatasetSummary {
  public: boolean;
  classes: DatasetClass[];
}
