import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { ProbeRow } from "../../core/entities/run";
import type { ArtifactWriterPort } from "../../core/ports/outboundPorts";

export const PROBE_FILE_NAME = "probe.json";
export const SITE_FILE_NAME = "index.html";

/**
 * Writes the debug snapshot and the site page, replacing previous runs' files.
 */
export class FileArtifactWriter implements ArtifactWriterPort {
  constructor(
    private readonly outputDir: string,
    private readonly siteDir: string,
  ) {}

  async writeProbe(rows: ProbeRow[]): Promise<string> {
    const path = resolve(this.outputDir, PROBE_FILE_NAME);
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(path, `${JSON.stringify(rows, null, 2)}\n`, "utf-8");
    return path;
  }

  async writeSite(html: string): Promise<string> {
    const path = resolve(this.siteDir, SITE_FILE_NAME);
    await mkdir(this.siteDir, { recursive: true });
    await writeFile(path, html, "utf-8");
    return path;
  }
}
