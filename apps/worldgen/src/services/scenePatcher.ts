import fs from 'node:fs';
import { BACKUP_SUFFIX, FEATURES_MARKER, WORLD_CLOSING_TAG } from '../config';
import type { PlacementRecord } from '../types/scene';

export class MalformedSceneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedSceneError';
  }
}

export function renderPlacement(p: PlacementRecord): string {
  const scale = p.scale !== 1 ? `\n      <scale>${p.scale} ${p.scale} ${p.scale}</scale>` : '';
  return `
  <model name="${p.name}">
    <include>
      <uri>${p.modelUri}</uri>
      <pose>${p.x} ${p.y} 0 0 0 0</pose>${scale}
    </include>
    <static>${p.static}</static>
  </model>`;
}

export const renderPlacements = (records: PlacementRecord[]): string =>
  `\n${FEATURES_MARKER}\n${records.map(renderPlacement).join('\n')}`;

// Inserts before the last </world>
export function spliceBeforeClosingTag(sceneText: string, fragment: string): string {
  const at = sceneText.lastIndexOf(WORLD_CLOSING_TAG);
  if (at === -1) {
    throw new MalformedSceneError(`Malformed scene file: no ${WORLD_CLOSING_TAG} tag found`);
  }
  return sceneText.slice(0, at) + fragment + sceneText.slice(at);
}

/**
 * Splice the placements into the world file. The untouched original is copied
 * to `<worldPath>.bak` before the patched text is written; nothing is written
 * when the file has no closing world tag.
 *
 * Not safe against concurrent runs on the same file.
 */
export function patchSceneFile(worldPath: string, records: PlacementRecord[]): { backupPath: string } {
  const original = fs.readFileSync(worldPath, 'utf8');
  const updated = spliceBeforeClosingTag(original, renderPlacements(records));

  const backupPath = worldPath + BACKUP_SUFFIX;
  fs.writeFileSync(backupPath, original);
  fs.writeFileSync(worldPath, updated);
  console.log(`[PATCH] Added ${records.length} models to ${worldPath} (backup saved as ${backupPath})`);
  return { backupPath };
}
