/**
 * OBJ loading - Wavefront OBJ text to planar convex faces
 *
 * three.js's OBJLoader fans every polygon into triangles; the triangle soup
 * then goes through the same weld, merge and orient steps as STL input.
 */

import { readFileSync } from 'node:fs';
import { Mesh, Vector3 } from 'three';
import { OBJLoader } from 'three/examples/jsm/loaders/OBJLoader.js';
import type { MeshFace } from '../engine/types';
import { facesFromTriangleSoup, unitScale } from './stlLoader';
import type { MeshLoadOptions } from './stlLoader';

/**
 * Parse OBJ text into planar faces in millimetres. Every mesh object in the
 * file is taken as part of one solid; lines and points are ignored.
 */
export function loadObj(text: string, options: MeshLoadOptions = {}): MeshFace[] {
  const scale = unitScale(options.unit);
  const group = new OBJLoader().parse(text);
  const positions: Vector3[] = [];

  group.traverse((object) => {
    if (!(object instanceof Mesh)) return;
    const geometry = object.geometry;
    const position = geometry.getAttribute('position');
    const index = geometry.getIndex();
    const count = index ? index.count : position.count;

    for (let i = 0; i < count; i++) {
      const k = index ? index.getX(i) : i;
      positions.push(new Vector3(position.getX(k), position.getY(k), position.getZ(k)).multiplyScalar(scale));
    }
    geometry.dispose();
  });

  return facesFromTriangleSoup(positions, 'OBJ');
}

export function readObjFile(path: string, options: MeshLoadOptions = {}): MeshFace[] {
  return loadObj(readFileSync(path, 'utf8'), options);
}
