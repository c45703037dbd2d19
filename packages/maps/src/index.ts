import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { LoadError, loadMap } from "conquest-engine";
import type { WorldMap } from "conquest-engine";

/** Absolute path of the bundled classic map: 42 regions, 6 groups. */
export const classicMapPath = fileURLToPath(new URL("../data/classic.json", import.meta.url));

/** Read a map document from disk and resolve it into a world map. */
export async function loadMapFile(path: string): Promise<WorldMap> {
  const text = await readFile(path, "utf8");
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError([`${path} is not valid JSON: ${reason}`]);
  }
  return loadMap(document);
}

export function loadClassicMap(): Promise<WorldMap> {
  return loadMapFile(classicMapPath);
}
