import { extname } from 'node:path';
import type { MeshFace } from '../engine/types';
import { ConfigError } from '../engine/errors';
import { readStlFile } from './stlLoader';
import type { MeshLoadOptions } from './stlLoader';
import { readObjFile } from './objLoader';

export const MESH_EXTENSIONS = ['.stl', '.obj'] as const;

/**
 * Read a mesh file, picking the parser by extension.
 *
 * @throws ConfigError for an extension no loader handles
 */
export function readMeshFile(path: string, options: MeshLoadOptions = {}): MeshFace[] {
  const extension = extname(path).toLowerCase();
  switch (extension) {
    case '.stl':
      return readStlFile(path, options);
    case '.obj':
      return readObjFile(path, options);
    default:
      throw new ConfigError(
        `Unsupported mesh format "${extension || path}"; expected one of ${MESH_EXTENSIONS.join(', ')}`,
        { path, extension }
      );
  }
}
