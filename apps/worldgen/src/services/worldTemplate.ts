import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const TEMPLATE_PATH = fileURLToPath(new URL('../../templates/world.sdf', import.meta.url));

export interface BaseWorldOptions {
  meshUri: string;
  scale: number; // same value the enhancer is later run with
  worldName?: string;
}

const escapeXml = (value: string) =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/**
 * SDF world with physics, lighting, a ground plane and the static
 * `osm_environment` model that references the generated terrain mesh.
 */
export function renderBaseWorld({ meshUri, scale, worldName = 'osm_world' }: BaseWorldOptions): string {
  const values: Record<string, string> = {
    worldName: escapeXml(worldName),
    meshUri: escapeXml(meshUri),
    scale: String(scale),
  };
  const template = fs.readFileSync(TEMPLATE_PATH, 'utf8');
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

export function writeBaseWorld(worldPath: string, options: BaseWorldOptions): void {
  fs.mkdirSync(path.dirname(worldPath), { recursive: true });
  fs.writeFileSync(worldPath, renderBaseWorld(options));
  console.log(`[WORLD] Wrote ${worldPath} (mesh ${options.meshUri}, scale ${options.scale})`);
}
