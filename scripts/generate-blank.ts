/**
 * Write a sample die blank as ASCII STL.
 *
 * Usage:
 *   npx tsx scripts/generate-blank.ts <d4|d6|d8|prism> <size-mm> [out.stl]
 *
 * For prism, size is the circumradius and the height equals the size.
 */

import { writeFileSync } from 'node:fs';
import { cube, octahedron, prism, tetrahedron } from '../src/builder/polyhedra';
import type { MeshFace } from '../src/engine/types';
import { generateSTL } from '../src/utils/stlExport';

const SHAPES: Record<string, (size: number) => MeshFace[]> = {
  d4: tetrahedron,
  d6: cube,
  d8: octahedron,
  prism: (size) => prism(6, size, size),
};

const [shape, sizeArg, outArg] = process.argv.slice(2);
const build = shape === undefined ? undefined : SHAPES[shape];
const size = Number(sizeArg);

if (!build || !(size > 0)) {
  console.error('Usage: npx tsx scripts/generate-blank.ts <d4|d6|d8|prism> <size-mm> [out.stl]');
  process.exit(1);
}

const out = outArg ?? `${shape}.stl`;
writeFileSync(out, generateSTL(build(size)));
console.error(`OK; wrote STL to: ${out}`);
