import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { spliceBeforeClosingTag } from './scenePatcher';
import { renderBaseWorld, writeBaseWorld } from './worldTemplate';

describe('renderBaseWorld', () => {
  const sdf = renderBaseWorld({ meshUri: 'meshes/map.obj', scale: 2 });

  it('references the mesh with a uniform scale', () => {
    expect(sdf.match(/<uri>meshes\/map\.obj<\/uri>/g)).toHaveLength(2);
    expect(sdf.match(/<scale>2 2 2<\/scale>/g)).toHaveLength(2);
  });

  it('names the world and the environment model', () => {
    expect(sdf).toContain('<world name="osm_world">');
    expect(sdf).toContain('<model name="osm_environment">');
  });

  it('gives the ground plane friction and both models a material', () => {
    expect(sdf).toContain('<collide_bitmask>65535</collide_bitmask>');
    expect(sdf).toContain('<mu>100</mu>');
    expect(sdf).toContain('<mu2>50</mu2>');
    expect(sdf).toContain('<name>Gazebo/Grey</name>');
    expect(sdf).toContain('<name>Gazebo/White</name>');
  });

  it('fills every placeholder', () => {
    expect(sdf).not.toContain('{{');
  });

  it('escapes XML in names', () => {
    expect(renderBaseWorld({ meshUri: 'a&b.obj', scale: 1, worldName: 'x"y' })).toContain('<world name="x&quot;y">');
  });

  it('can be patched', () => {
    expect(() => spliceBeforeClosingTag(sdf, '<!-- x -->')).not.toThrow();
  });
});

describe('writeBaseWorld', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'worldgen-world-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing folders', () => {
    const file = path.join(dir, 'worlds', 'map.world');
    writeBaseWorld(file, { meshUri: 'map.obj', scale: 1 });
    expect(fs.readFileSync(file, 'utf8')).toBe(renderBaseWorld({ meshUri: 'map.obj', scale: 1 }));
  });
});
