import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/**
 * Writes `text` to a fresh file in a fresh temp directory, hands its path to `fn`,
 * and removes the directory afterwards whether `fn` resolves or throws.
 */
export async function withTempConfig<T>(
  text: string,
  fn: (configPath: string) => Promise<T>,
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "atr-sweep-"));
  try {
    const configPath = path.join(dir, "config.yaml");
    await fs.writeFile(configPath, text, "utf8");
    return await fn(configPath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
