import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import {
  FileReportStore,
  MemoryReportStore,
  reportFileName,
} from "../../src/services/workflow/report.store";

const SAVED_AT = new Date(2026, 0, 5, 9, 7, 3);

test("reportFileName stamps the local date and time", () => {
  assert.equal(reportFileName(SAVED_AT), "output_20260105_090703.txt");
});

test("FileReportStore creates the directory and writes the report", async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "social-posts-"));
  const directory = path.join(root, "nested", "reports");
  const store = new FileReportStore(directory);

  try {
    const stored = await store.save("report body", SAVED_AT);

    assert.equal(stored.name, "output_20260105_090703.txt");
    assert.equal(stored.location, path.join(directory, "output_20260105_090703.txt"));
    assert.equal(await fs.readFile(stored.location, "utf8"), "report body");
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
});

test("MemoryReportStore keeps reports by name", async () => {
  const store = new MemoryReportStore();

  const stored = await store.save("in memory", SAVED_AT);

  assert.equal(stored.location, "memory://output_20260105_090703.txt");
  assert.equal(store.reports.get("output_20260105_090703.txt"), "in memory");
});
