/**
 * Copies dashboard descriptors into the directory Grafana provisions from.
 *
 * Descriptors are opaque to us: each must parse as a JSON object, and is
 * then copied byte-for-byte.
 */

import { copyFile, mkdir, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface DashboardProvisionerOptions {
  /** Where the checked-in descriptors live */
  sourceDir: string;
  /** Directory mounted into the dashboard server */
  targetDir: string;
  logger: Logger;
}

export class DashboardProvisioner {
  private sourceDir: string;
  private targetDir: string;
  private logger: Logger;

  constructor(options: DashboardProvisionerOptions) {
    this.sourceDir = options.sourceDir;
    this.targetDir = options.targetDir;
    this.logger = options.logger;
  }

  /** Returns the file names copied. A missing source directory copies nothing. */
  async provision(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.sourceDir);
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug({ sourceDir: this.sourceDir }, "No dashboards to provision");
        return [];
      }
      throw err;
    }

    const files = entries.filter((name) => name.endsWith(".json")).sort();
    if (files.length === 0) return [];

    await mkdir(this.targetDir, { recursive: true });
    for (const name of files) {
      const src = join(this.sourceDir, name);
      assertDescriptor(name, await readFile(src, "utf8"));
      await copyFile(src, join(this.targetDir, name));
    }

    this.logger.info({ count: files.length, targetDir: this.targetDir }, "Provisioned dashboards");
    return files;
  }
}

function assertDescriptor(name: string, raw: string): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Dashboard "${name}" is not valid JSON`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Dashboard "${name}" must be a JSON object`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
