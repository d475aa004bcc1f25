import { mkdir, writeFile, readdir } from "node:fs/promises";
import { join } from "node:path";

export interface Artifact {
  id: string;
  /** Subdirectory, e.g. "screenshots" */
  group: string;
  format: string;
  data: Buffer;
  createdAt: number;
}

/**
 * Persists failure artifacts (screenshots) to the local filesystem under a
 * configurable root directory.
 */
export class ArtifactStorage {
  constructor(private readonly rootDir: string) {}

  async store(artifact: Artifact): Promise<string> {
    const dir = join(this.rootDir, artifact.group);
    await mkdir(dir, { recursive: true });

    const filename = `${artifact.id}.${artifact.format}`;
    const path = join(dir, filename);
    await writeFile(path, artifact.data);
    return path;
  }

  async list(group: string): Promise<string[]> {
    const dir = join(this.rootDir, group);
    try {
      return await readdir(dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
