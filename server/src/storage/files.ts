import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import type { Attachment } from "../db/schema.js";

/** Where attachment bodies live. Rows in the database only hold `storedName`. */
export interface FileStorage {
  /** Store `data` and return the name it was stored under. */
  save(data: Buffer, originalName: string): string;
  read(storedName: string): Buffer;
  remove(storedName: string): void;
}

/** Attachment bodies as files in one directory, named by uuid. */
export class DiskFileStorage implements FileStorage {
  private dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  save(data: Buffer, originalName: string): string {
    const storedName = `${uuidv4()}${path.extname(originalName).toLowerCase()}`;
    fs.writeFileSync(this.resolve(storedName), data);
    return storedName;
  }

  read(storedName: string): Buffer {
    return fs.readFileSync(this.resolve(storedName));
  }

  remove(storedName: string): void {
    const filePath = this.resolve(storedName);
    if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
  }

  // path.basename() neutralises any traversal in a stored name.
  private resolve(storedName: string): string {
    return path.join(this.dir, path.basename(storedName));
  }
}

/** Delete the stored bodies of removed attachment rows. Failures are logged, not thrown. */
export function removeStoredFiles(files: FileStorage, attachments: readonly Attachment[]): void {
  for (const attachment of attachments) {
    try {
      files.remove(attachment.storedName);
    } catch (err) {
      console.error(`[files] Failed to remove ${attachment.storedName}:`, err);
    }
  }
}
