// Fix OSM structure before mesh generation: close building ways and add
// building:levels=1 where missing. Files are rewritten in place.
//
// Usage:
//   npm run fix-osm -- --in data/map.osm
//   npm run fix-osm -- --in data/extracts     # every **/*.osm below the folder

import fs from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fixOsmFile } from '../src/services/osmFixer.js';

const argv = yargs(hideBin(process.argv))
  .option('in', { type:'string', demandOption:true, desc:'OSM file, or folder searched for .osm files' })
  .parseSync();

const INPUT = path.resolve(argv.in);

async function run() {
  const files = fs.statSync(INPUT).isDirectory()
    ? await glob('**/*.osm', { cwd: INPUT, absolute: true, nodir: true })
    : [INPUT];
  if (files.length===0) {
    console.error('No OSM files found in', INPUT);
    process.exit(1);
  }

  let totalUnclosed = 0;
  let totalLevels = 0;
  for (const f of files) {
    const { unclosedWays, missingBuildingLevels } = fixOsmFile(f);
    totalUnclosed += unclosedWays;
    totalLevels += missingBuildingLevels;
  }

  console.log(`\nDone! Fixed ${files.length} OSM files: ${totalUnclosed} ways closed, ${totalLevels} building:levels added`);
}

run().catch(err=>{ console.error(err); process.exit(1); });
