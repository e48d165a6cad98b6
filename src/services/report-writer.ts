import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env.js";
import { PLATFORM_MAP, isSupportedPlatform } from "../domain/platforms.js";
import type { RunResult } from "../types/pipeline.js";
import { buildRssXml } from "../utils/rss.js";

const MODE_TITLES: Record<RunResult["mode"], string> = {
  daily: "当日汇总",
  current: "当前榜单",
  incremental: "新增热点",
};

function platformTitle(platform: string): string {
  return isSupportedPlatform(platform) ? (PLATFORM_MAP.get(platform)?.title ?? platform) : platform;
}

export function renderReport(result: RunResult, generatedAt: string): string {
  return buildRssXml({
    title: `热点监测：${MODE_TITLES[result.mode]}`,
    link: `urn:hotlist-radar:${result.signature}`,
    description: `matched=${result.stats.matchedRecords} platforms=${result.stats.platformsSucceeded}/${result.stats.platformsQueried}`,
    lastBuildDate: generatedAt,
    items: result.records.map((record) => {
      const ranks = record.observations.map((observation) => observation.rank).join(" → ");
      return {
        title: record.title,
        link: record.url || record.mobileUrl || `urn:hotlist-radar:${encodeURIComponent(record.identity)}`,
        description: `${platformTitle(record.platform)} · ranks ${ranks} · first ${record.firstSeen.start} · last ${record.lastSeen.start}`,
        category: record.keyword,
        pubDate: record.lastSeen.start,
      };
    }),
  });
}

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const FILE_PATTERN = /^[0-9a-f]{16}-(daily|current|incremental)-\d{9}-[0-9a-f]{6}\.xml$/;

/** Writes reports as `<reportDir>/<day>/<signature>-<mode>-<hhmmssSSS>-<nonce>.xml`. */
export class ReportWriter {
  private readonly reportDir: string;

  constructor(reportDir = env.REPORT_DIR) {
    this.reportDir = path.isAbsolute(reportDir) ? reportDir : path.resolve(process.cwd(), reportDir);
  }

  /** Returns the addressable path the HTTP layer serves the artifact under. */
  async write(result: RunResult, now = new Date()): Promise<string> {
    const generatedAt = now.toISOString();
    const day = generatedAt.slice(0, 10);
    const stamp = generatedAt.slice(11, 23).replace(/[:.]/g, "");
    const fileName = `${result.signature}-${result.mode}-${stamp}-${randomBytes(3).toString("hex")}.xml`;
    const directory = path.join(this.reportDir, day);

    await fs.mkdir(directory, { recursive: true });
    // "wx" refuses to replace an existing artifact.
    await fs.writeFile(path.join(directory, fileName), renderReport(result, generatedAt), {
      encoding: "utf8",
      flag: "wx",
    });

    return `/reports/${day}/${fileName}`;
  }

  async read(day: string, fileName: string): Promise<string | undefined> {
    if (!DAY_PATTERN.test(day) || !FILE_PATTERN.test(fileName)) return undefined;
    try {
      return await fs.readFile(path.join(this.reportDir, day, fileName), "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return undefined;
      throw error;
    }
  }
}
