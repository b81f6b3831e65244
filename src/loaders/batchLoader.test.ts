import fs from "fs";
import { loadManifest, loadTaskBatch } from "./batchLoader";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

describe("batchLoader", () => {
  const task = {
    taskId: "t1",
    learnerId: "learner-1",
    assignmentId: "a1",
    kind: "MCQ",
    payload: { selected: "B", key: "B" },
    rubricRef: "mcq-basic",
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockFs.existsSync.mockReturnValue(true);
  });

  describe("loadTaskBatch", () => {
    it("accepts a bare array of tasks", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify([task]));

      expect(loadTaskBatch("/batch/tasks.json")).toEqual([task]);
    });

    it("accepts a tasks wrapper object", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify({ tasks: [task, { ...task, taskId: "t2", kind: "ESSAY_RUBRIC_V2" }] }));

      expect(loadTaskBatch("/batch/tasks.json").map((t) => t.kind)).toEqual(["MCQ", "ESSAY_RUBRIC_V2"]);
    });

    it("names the file and field of an invalid task", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify([{ ...task, learnerId: " " }]));

      expect(() => loadTaskBatch("/batch/tasks.json")).toThrow("Invalid task batch /batch/tasks.json");
    });

    it("throws when the file is missing", () => {
      mockFs.existsSync.mockReturnValue(false);

      expect(() => loadTaskBatch("/batch/none.json")).toThrow("File not found: /batch/none.json");
    });
  });

  describe("loadManifest", () => {
    it("loads an assignment manifest", () => {
      const manifest = { assignmentId: "a1", tasks: [{ taskId: "t1", learnerId: "learner-1" }] };
      mockFs.readFileSync.mockReturnValue(JSON.stringify(manifest));

      expect(loadManifest("/batch/manifest.json")).toEqual(manifest);
    });

    it("rejects a manifest without an assignment id", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify({ tasks: [] }));

      expect(() => loadManifest("/batch/manifest.json")).toThrow("Invalid manifest /batch/manifest.json: assignmentId: Required");
    });
  });
});
