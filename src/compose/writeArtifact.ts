import fs from "node:fs";
import path from "node:path";

/** Writes through a sibling temp file and a rename, so readers never see a partial digest. */
export async function writeArtifact(outputPath: string, content: string): Promise<void> {
  const absolutePath = path.resolve(outputPath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.${process.pid}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, content, "utf-8");
    await fs.promises.rename(tempPath, absolutePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
