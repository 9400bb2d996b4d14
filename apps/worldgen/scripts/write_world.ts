/*
  Write the base SDF world that wraps a generated terrain mesh

  Usage:
    npm run write-world -- \
      --out worlds/map.world \
      --mesh meshes/map.obj \
      --scale 1.0
*/

import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from '../src/config.js';
import { writeBaseWorld } from '../src/services/worldTemplate.js';

const config = loadConfig();

const argv = yargs(hideBin(process.argv))
  .option('out', { type:'string', demandOption:true, desc:'World file to write' })
  .option('mesh', { type:'string', demandOption:true, desc:'Mesh URI, relative to the world file' })
  .option('scale', { type:'number', default:config.scale, desc:'Uniform mesh scale' })
  .option('name', { type:'string', default:'osm_world', desc:'World name' })
  .parseSync();

writeBaseWorld(path.resolve(argv.out), { meshUri: argv.mesh, scale: argv.scale, worldName: argv.name });
