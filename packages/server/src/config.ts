/**
 * Server configuration: environment variables and the configs/ directory.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));

const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  /** `.osm.pbf` extract loaded at startup */
  MAP_PBF_PATH: z.string().min(1).optional(),
  OVERPASS_ENDPOINT: z.string().url().optional(),
  /** Upper bound on A* node expansions per route query */
  MAX_ROUTE_EXPANSIONS: z.coerce.number().int().positive().optional(),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

/**
 * Read and validate server settings from an environment map.
 *
 * @throws Error listing every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = serverConfigSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Walk up directories to find `configs/`.
 * Works from both source (packages/server/src/) and compiled (dist/packages/server/src/) paths.
 */
export function findConfigsRoot(startDir: string = __dirname): string {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return join(resolve(__dirname, "..", "..", ".."), "configs");
}

const rasterConfigSchema = z
  .object({
    rootUlLon: z.number(),
    rootUlLat: z.number(),
    rootLrLon: z.number(),
    rootLrLat: z.number(),
    tileSize: z.number().int().positive(),
    maxDepth: z.number().int().min(0).max(20),
  })
  .refine((c) => c.rootUlLon < c.rootLrLon && c.rootUlLat > c.rootLrLat, {
    message: "root box must have its upper-left corner north-west of its lower-right corner",
  });

/** Root tile box and pyramid shape for the raster endpoint */
export type RasterConfig = z.infer<typeof rasterConfigSchema>;

/** The Berkeley tile set the bundled configs/raster.json describes */
export const DEFAULT_RASTER_CONFIG: RasterConfig = {
  rootUlLon: -122.2998046875,
  rootUlLat: 37.892195547244356,
  rootLrLon: -122.2119140625,
  rootLrLat: 37.82280243352756,
  tileSize: 256,
  maxDepth: 7,
};

/**
 * Load `raster.json` from the configs directory. Falls back to the
 * compiled-in defaults when the file is absent; an invalid file throws.
 */
export function loadRasterConfig(configsRoot: string = findConfigsRoot()): RasterConfig {
  const filePath = join(configsRoot, "raster.json");
  if (!existsSync(filePath)) return DEFAULT_RASTER_CONFIG;

  const parsed = rasterConfigSchema.safeParse(JSON.parse(readFileSync(filePath, "utf-8")));
  if (!parsed.success) {
    throw new Error(`Invalid raster config ${filePath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}
