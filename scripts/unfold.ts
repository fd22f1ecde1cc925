/**
 * Unfold a die blank (STL or OBJ) into a tape-width SVG cut file.
 *
 * Usage:
 *   npx tsx scripts/unfold.ts d6.stl --tape-width 15 --mode hamiltonian --out d6.svg
 */

import { writeFileSync } from 'node:fs';
import { runUnfold } from '../src/cli/runUnfold';
import { readMeshFile } from '../src/mesh/readMeshFile';

process.exitCode = runUnfold(process.argv.slice(2), {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  readMesh: readMeshFile,
  writeFile: (path, contents) => writeFileSync(path, contents),
});
