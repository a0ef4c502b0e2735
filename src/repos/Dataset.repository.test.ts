import mongoose, { ClientSession, Types } from "mongoose";
import DatasetRepository, { MongoDatasetWriter } from "./Dataset.repository";
import { Dataset } from "../models/dataset.model";
import { DatasetClass } from "../models/datasetClass.model";
import { DatasetClassMember } from "../models/datasetClassMember.model";

function fakeSession(inTransaction = true) {
  return {
    startTransaction: jest.fn(),
    commitTransaction: jest.fn().mockResolvedValue(undefined),
    abortTransaction: jest.fn().mockResolvedValue(undefined),
    endSession: jest.fn().mockResolvedValue(undefined),
    inTransaction: jest.fn().mockReturnValue(inTransaction),
  };
}

function asSession(s: ReturnType<typeof fakeSession>) {
  return s as unknown as ClientSession;
}

describe("DatasetRepository.transaction", () => {
  const repo = new DatasetRepository();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("commits and ends the session when the work resolves", async () => {
    const session = fakeSession();
    jest.spyOn(mongoose, "startSession").mockResolvedValue(asSession(session));

    await expect(repo.transaction(async () => "done")).resolves.toBe("done");

    expect(session.startTransaction).toHaveBeenCalledTimes(1);
    expect(session.commitTransaction).toHaveBeenCalledTimes(1);
    expect(session.abortTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("aborts, ends the session and rethrows when the work fails", async () => {
    const session = fakeSession();
    jest.spyOn(mongoose, "startSession").mockResolvedValue(asSession(session));
    const boom = new Error("write conflict");

    await expect(repo.transaction(async () => { throw boom; })).rejects.toBe(boom);

    expect(session.commitTransaction).not.toHaveBeenCalled();
    expect(session.abortTransaction).toHaveBeenCalledTimes(1);
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("does not abort a transaction that is no longer open", async () => {
    const session = fakeSession(false);
    session.commitTransaction.mockRejectedValue(new Error("commit failed"));
    jest.spyOn(mongoose, "startSession").mockResolvedValue(asSession(session));

    await expect(repo.transaction(async () => 1)).rejects.toThrow("commit failed");

    expect(session.abortTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("keeps the original error when aborting fails too", async () => {
    const session = fakeSession();
    session.abortTransaction.mockRejectedValue(new Error("network down"));
    jest.spyOn(mongoose, "startSession").mockResolvedValue(asSession(session));
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(repo.transaction(async () => { throw new Error("insert failed"); })).rejects.toThrow("insert failed");
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });
});

describe("DatasetRepository.read", () => {
  const repo = new DatasetRepository();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("runs every query in one snapshot transaction", async () => {
    const session = fakeSession();
    jest.spyOn(mongoose, "startSession").mockResolvedValue(asSession(session));
    const query = {
      session: jest.fn().mockReturnThis(),
      lean: jest.fn().mockResolvedValue(null),
    };
    jest.spyOn(Dataset, "findById").mockReturnValue(query as never);

    await expect(repo.read((reader) => reader.findDataset("d1"))).resolves.toBeNull();

    expect(session.startTransaction).toHaveBeenCalledWith({ readConcern: { level: "snapshot" } });
    expect(query.session).toHaveBeenCalledWith(session);
    expect(session.commitTransaction).toHaveBeenCalledTimes(1);
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("queries outside a session when called directly", async () => {
    const startSession = jest.spyOn(mongoose, "startSession");
    const query = {
      select: jest.fn().mockReturnThis(),
      session: jest.fn().mockReturnThis(),
      lean: jest.fn().mockResolvedValue([{ mbid: "770cc467-8dde-4d22-bc4c-a42f91e7515e" }]),
    };
    jest.spyOn(DatasetClassMember, "find").mockReturnValue(query as never);

    await expect(repo.findMembers(new Types.ObjectId().toString())).resolves.toEqual([
      "770cc467-8dde-4d22-bc4c-a42f91e7515e",
    ]);
    expect(query.session).toHaveBeenCalledWith(null);
    expect(startSession).not.toHaveBeenCalled();
  });
});

describe("MongoDatasetWriter", () => {
  const session = asSession(fakeSession());
  const writer = new MongoDatasetWriter(session);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("updates the dataset inside the session and reports matches", async () => {
    const exec = jest.fn().mockResolvedValue({ matchedCount: 0 });
    const updateOne = jest.spyOn(Dataset, "updateOne").mockReturnValue({ exec } as never);
    const fields = { name: "n", description: null, public: true, author: "user-1" };

    await expect(writer.updateDataset("d1", fields)).resolves.toBe(0);
    expect(updateOne).toHaveBeenCalledWith({ _id: "d1" }, { $set: fields }, { session });
  });

  it("deletes members before classes", async () => {
    const classId = new Types.ObjectId();
    const query = {
      select: jest.fn().mockReturnThis(),
      session: jest.fn().mockReturnThis(),
      lean: jest.fn().mockResolvedValue([{ _id: classId }]),
    };
    jest.spyOn(DatasetClass, "find").mockReturnValue(query as never);
    const deleteMembers = jest
      .spyOn(DatasetClassMember, "deleteMany")
      .mockReturnValue({ exec: jest.fn().mockResolvedValue({ deletedCount: 2 }) } as never);
    const deleteClasses = jest
      .spyOn(DatasetClass, "deleteMany")
      .mockReturnValue({ exec: jest.fn().mockResolvedValue({ deletedCount: 1 }) } as never);

    await writer.deleteClasses("d1");

    expect(query.session).toHaveBeenCalledWith(session);
    expect(deleteMembers).toHaveBeenCalledWith({ class: { $in: [classId] } }, { session });
    expect(deleteClasses).toHaveBeenCalledWith({ dataset: "d1" }, { session });
    expect(deleteMembers.mock.invocationCallOrder[0]).toBeLessThan(deleteClasses.mock.invocationCallOrder[0]);
  });

  it("saves a new dataset inside the session", async () => {
    const save = jest.spyOn(Object.getPrototypeOf(new Dataset()), "save").mockResolvedValue(undefined);

    const id = await writer.insertDataset({ name: "Moods", description: null, public: true, author: "user-1" });

    expect(save).toHaveBeenCalledWith({ session });
    expect(typeof id).toBe("string");
    expect(id).toHaveLength(36);
  });

  it("saves a new class inside the session", async () => {
    const save = jest.spyOn(Object.getPrototypeOf(new DatasetClass()), "save").mockResolvedValue(undefined);

    const id = await writer.insertClass({ name: "happy", description: null, dataset: "d1" });

    expect(save).toHaveBeenCalledWith({ session });
    expect(Types.ObjectId.isValid(id)).toBe(true);
  });

  it("removes the classes before the dataset row", async () => {
    const deleteClasses = jest.spyOn(writer, "deleteClasses").mockResolvedValue(undefined);
    const deleteOne = jest
      .spyOn(Dataset, "deleteOne")
      .mockReturnValue({ exec: jest.fn().mockResolvedValue({ deletedCount: 1 }) } as never);

    await expect(writer.deleteDataset("d1")).resolves.toBe(1);

    expect(deleteClasses).toHaveBeenCalledWith("d1");
    expect(deleteOne).toHaveBeenCalledWith({ _id: "d1" }, { session });
    expect(deleteClasses.mock.invocationCallOrder[0]).toBeLessThan(deleteOne.mock.invocationCallOrder[0]);
  });

  it("skips the insert for a class without recordings", async () => {
    const insertMany = jest.spyOn(DatasetClassMember, "insertMany");

    await writer.insertMembers(new Types.ObjectId().toString(), []);
    expect(insertMany).not.toHaveBeenCalled();
  });

  it("inserts one member per recording", async () => {
    const insertMany = jest.spyOn(DatasetClassMember, "insertMany").mockResolvedValue([] as never);
    const classId = new Types.ObjectId();
    const mbid = "770cc467-8dde-4d22-bc4c-a42f91e7515e";

    await writer.insertMembers(classId.toString(), [mbid, mbid]);

    expect(insertMany).toHaveBeenCalledWith(
      [{ class: classId, mbid }, { class: classId, mbid }],
      { session }
    );
  });
});
