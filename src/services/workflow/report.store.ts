import fs from "node:fs/promises";
import path from "node:path";

export interface StoredReport {
  name: string;
  location: string;
  savedAt: string;
}

export interface ReportStore {
  save(text: string, savedAt?: Date): Promise<StoredReport>;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function reportFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `output_${day}_${time}.txt`;
}

export class FileReportStore implements ReportStore {
  constructor(private readonly directory: string) {}

  async save(text: string, savedAt = new Date()): Promise<StoredReport> {
    await fs.mkdir(this.directory, { recursive: true });
    const name = reportFileName(savedAt);
    const location = path.resolve(this.directory, name);
    await fs.writeFile(location, text, "utf8");

    return { name, location, savedAt: savedAt.toISOString() };
  }
}

export class MemoryReportStore implements ReportStore {
  public readonly reports = new Map<string, string>();

  async save(text: string, savedAt = new Date()): Promise<StoredReport> {
    const name = reportFileName(savedAt);
    this.reports.set(name, text);
    return { name, location: `memory://${name}`, savedAt: savedAt.toISOString() };
  }
}
