import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { logger } from "../logger.js";
import { STORE_FILES, type StoreFileKey } from "./files.js";
import { isAdminRecord, isDeviceRecord, isThresholdRecord } from "./schemas.js";
import type { AdminRecord, DeviceRecord, ThresholdRecord } from "./types.js";

type FileValueMap = {
  admins: AdminRecord[];
  thresholds: ThresholdRecord[];
  devices: DeviceRecord[];
};

type Guards = { [K in StoreFileKey]: (value: unknown) => value is FileValueMap[K][number] };

const GUARDS: Guards = {
  admins: isAdminRecord,
  thresholds: isThresholdRecord,
  devices: isDeviceRecord,
};

const log = logger.child("json-store");

const exists = (filePath: string): Promise<boolean> =>
  access(filePath).then(
    () => true,
    () => false,
  );

const parseArray = async (filePath: string): Promise<unknown[]> => {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path.basename(filePath)} is not a JSON array`);
  }
  return parsed;
};

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * JSON array files, one per record type. Each file has its own queue so that
 * read-modify-write cycles never interleave. Every write keeps the previous
 * version as `.bak`, which a corrupt file is restored from.
 */
export class JsonStore {
  private readonly queues = new Map<StoreFileKey, Promise<void>>();

  constructor(private readonly dataDir: string) {}

  async init(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    for (const key of Object.keys(STORE_FILES) as StoreFileKey[]) {
      const filePath = this.resolvePath(key);
      if (!(await exists(filePath))) {
        await this.replaceFile(filePath, [], false);
      }
    }
  }

  /** Reads a file, dropping entries that fail the record guard. */
  async read<K extends StoreFileKey>(key: K): Promise<FileValueMap[K]> {
    const raw = await this.loadArray(key);
    const guard: (value: unknown) => boolean = GUARDS[key];
    const valid = raw.filter((item) => guard(item));
    if (valid.length !== raw.length) {
      log.warn("Dropped malformed records", { file: STORE_FILES[key], dropped: raw.length - valid.length });
    }
    return valid as FileValueMap[K];
  }

  async write<K extends StoreFileKey>(key: K, value: FileValueMap[K]): Promise<void> {
    await this.update(key, () => value);
  }

  /** Replaces the records of a file with `mutate(current)`, queued behind other writes to it. */
  update<K extends StoreFileKey>(
    key: K,
    mutate: (records: FileValueMap[K]) => FileValueMap[K],
  ): Promise<FileValueMap[K]> {
    return this.enqueue(key, async () => {
      const next = mutate(await this.read(key));
      await this.replaceFile(this.resolvePath(key), next, true);
      return next;
    });
  }

  private enqueue<T>(key: StoreFileKey, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    this.queues.set(
      key,
      result.then(
        () => undefined,
        () => undefined,
      ),
    );
    return result;
  }

  private async loadArray(key: StoreFileKey): Promise<unknown[]> {
    const filePath = this.resolvePath(key);
    try {
      return await parseArray(filePath);
    } catch (error) {
      log.error("Failed to parse store file", { file: STORE_FILES[key], message: errorText(error) });
    }

    try {
      const restored = await parseArray(`${filePath}.bak`);
      await this.replaceFile(filePath, restored, false);
      log.warn("Restored store file from backup", { file: STORE_FILES[key], records: restored.length });
      return restored;
    } catch (error) {
      log.error("No usable backup, starting empty", { file: STORE_FILES[key], message: errorText(error) });
      await this.replaceFile(filePath, [], false);
      return [];
    }
  }

  private async replaceFile(filePath: string, value: unknown, keepBackup: boolean): Promise<void> {
    const tmpPath = `${filePath}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    if (keepBackup && (await exists(filePath))) {
      await rename(filePath, `${filePath}.bak`);
    }
    await rename(tmpPath, filePath);
  }

  private resolvePath(key: StoreFileKey): string {
    return path.join(this.dataDir, STORE_FILES[key]);
  }
}
