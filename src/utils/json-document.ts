import { readFile, writeFile, rename, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import type { z } from "zod";
import { logger } from "./logger";

/** A single structured document, read wholesale and rewritten wholesale. */
export interface DocumentStore<T> {
  readonly name: string;
  read(): Promise<T | null>;
  write(data: T): Promise<void>;
}

/**
 * Write data to a file atomically by writing to a .tmp sibling first,
 * then renaming. Prevents partial reads.
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpName = `${filePath}.${randomBytes(6).toString("hex")}.tmp`;
  await writeFile(tmpName, JSON.stringify(data, null, 2) + "\n", "utf-8");
  await rename(tmpName, filePath);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class JsonFileDocument<T> implements DocumentStore<T> {
  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  get name(): string {
    return this.filePath;
  }

  /** Missing, unparseable or invalid files read as null. */
  async read(): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Could not parse ${this.filePath}, starting empty`, error);
      return null;
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`Invalid contents in ${this.filePath}, starting empty`, parsed.error.message);
      return null;
    }
    return parsed.data;
  }

  async write(data: T): Promise<void> {
    await atomicWriteJson(this.filePath, data);
  }
}

/** Reads through to another document and drops every write (dry runs). */
export class ReadOnlyDocument<T> implements DocumentStore<T> {
  constructor(private readonly inner: DocumentStore<T>) {}

  get name(): string {
    return this.inner.name;
  }

  read(): Promise<T | null> {
    return this.inner.read();
  }

  async write(_data: T): Promise<void> {
    logger.debug(`Dry run: not writing ${this.inner.name}`);
  }
}
