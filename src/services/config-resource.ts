import fs from "node:fs/promises";
import path from "node:path";
import { cloneSnapshot, emptySnapshot, parseConfigSnapshot } from "../domain/config-snapshot.js";
import type { ConfigSnapshot } from "../types/pipeline.js";

/**
 * The one process-wide configuration copy. Only the isolation manager writes
 * it; everything downstream receives a snapshot by value.
 */
export interface ConfigResource {
  read(): Promise<ConfigSnapshot>;
  write(snapshot: ConfigSnapshot): Promise<void>;
}

export class InMemoryConfigResource implements ConfigResource {
  private current: ConfigSnapshot;

  constructor(initial: ConfigSnapshot = emptySnapshot()) {
    this.current = cloneSnapshot(initial);
  }

  async read(): Promise<ConfigSnapshot> {
    return cloneSnapshot(this.current);
  }

  async write(snapshot: ConfigSnapshot): Promise<void> {
    this.current = cloneSnapshot(snapshot);
  }
}

interface ConfigFileShapeV1 {
  version: 1;
  updatedAt: string;
  config: ConfigSnapshot;
}

export class FileBackedConfigResource implements ConfigResource {
  private readonly configPath: string;
  private readonly tmpPath: string;

  constructor(configPath: string) {
    const absolute = path.isAbsolute(configPath) ? configPath : path.resolve(process.cwd(), configPath);
    this.configPath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  async read(): Promise<ConfigSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return emptySnapshot();
      throw error;
    }

    const parsed = JSON.parse(raw) as unknown;
    const body =
      parsed !== null && typeof parsed === "object" && "config" in parsed ? parsed.config : parsed;
    return parseConfigSnapshot(body);
  }

  async write(snapshot: ConfigSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    const payload: ConfigFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      config: snapshot,
    };
    await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(this.tmpPath, this.configPath);
  }
}
