import { realpath, stat } from 'node:fs/promises';
import { basename, isAbsolute, relative, resolve, sep } from 'node:path';
import { ModelFileError } from '../errors/http-errors.js';
import { ModelFile } from '../types/index.js';

/**
 * True when `candidate` is `root` itself or lies somewhere beneath it.
 * Purely lexical; callers compare real paths when symlinks matter.
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = relative(resolve(root), resolve(candidate));
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Resolve a model path on the service host to a readable regular file.
 * Relative paths resolve against `modelRoot` when one is configured, and
 * symlinks may not lead out of it.
 */
export async function resolveModelFile(modelPath: string, modelRoot?: string): Promise<ModelFile> {
  const path = modelRoot ? resolve(modelRoot, modelPath) : resolve(modelPath);
  const outside = () => new ModelFileError(`Model path '${modelPath}' is outside the permitted model directory`);

  if (modelRoot && !isWithinRoot(modelRoot, path)) {
    throw outside();
  }

  let target: string;
  let size: number;
  try {
    target = await realpath(path);
    const stats = await stat(target);
    if (!stats.isFile()) {
      throw new ModelFileError(`Model path '${modelPath}' is not a regular file`);
    }
    size = stats.size;
  } catch (error) {
    if (error instanceof ModelFileError) {
      throw error;
    }
    throw new ModelFileError(`Model file not found: '${modelPath}'`);
  }

  if (modelRoot && !isWithinRoot(await realpath(modelRoot), target)) {
    throw outside();
  }

  return { path: target, filename: basename(path), size };
}
