import { z } from "zod";
import type { GroupId, RegionId } from "./types.js";
import type { GroupInfo, RegionInfo, WorldMap } from "./map.js";
import { validateMap } from "./map.js";
import { LoadError } from "./errors.js";

// Wire format of a map document. Region and group names double as ids.
export const MapDocumentSchema = z.object({
  regions: z.record(
    z.string().min(1),
    z.object({
      group: z.string().min(1),
      neighbors: z.array(z.string().min(1)),
    }),
  ),
  groups: z.record(
    z.string().min(1),
    z.object({
      bonus: z.number().int().min(0),
      regions: z.array(z.string().min(1)),
    }),
  ),
});

export type MapDocument = z.infer<typeof MapDocumentSchema>;

/**
 * Parse a map document into a {@link WorldMap}. Every neighbour and group
 * membership must name a declared region; otherwise a {@link LoadError}
 * lists all unresolved references.
 */
export function loadMap(document: unknown): WorldMap {
  const parsed = MapDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new LoadError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }

  const regions: Record<string, RegionInfo> = {};
  const adjacency: Record<string, readonly RegionId[]> = {};
  for (const [name, entry] of Object.entries(parsed.data.regions)) {
    regions[name] = { name, groupId: entry.group as GroupId };
    adjacency[name] = entry.neighbors.map((n) => n as RegionId);
  }

  const groups: Record<string, GroupInfo> = {};
  for (const [name, entry] of Object.entries(parsed.data.groups)) {
    groups[name] = {
      bonus: entry.bonus,
      regionIds: entry.regions.map((r) => r as RegionId),
    };
  }

  const map: WorldMap = { regions, adjacency, groups };
  const validation = validateMap(map);
  if (!validation.valid) {
    throw new LoadError(validation.errors);
  }
  return map;
}
