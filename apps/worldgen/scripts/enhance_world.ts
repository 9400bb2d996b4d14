/*
  Add benches, trees and woods from an OSM extract to an SDF world file

  The world file is patched in place; the previous version is kept as <world>.bak.
  --scale must match the scale the terrain mesh was written with.

  Usage:
    npm run enhance -- \
      --osm data/map.osm \
      --world worlds/map.world \
      --scale 1.0 \
      --seed 42
*/

import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from '../src/config.js';
import { enhanceWorld } from '../src/services/enhancer.js';

const config = loadConfig();

const argv = yargs(hideBin(process.argv))
  .option('osm', { type:'string', demandOption:true, desc:'Input OSM file' })
  .option('world', { type:'string', demandOption:true, desc:'SDF world file to enhance' })
  .option('scale', { type:'number', default:config.scale, desc:'Scale factor used for the terrain mesh' })
  .option('seed', { type:'number', desc:'Seed for proxy tree jitter and scale (random when omitted)' })
  .parseSync();

const result = enhanceWorld({
  osmPath: path.resolve(argv.osm),
  worldPath: path.resolve(argv.world),
  scale: argv.scale,
  seed: argv.seed ?? config.seed,
});

console.log(result.ok ? `\n✅ ${result.message}` : `\n❌ ${result.message}`);
process.exitCode = result.ok ? 0 : 1;
