import { readFile, writeFile } from 'node:fs/promises';

import { CatalogValidationError, parseCatalog, serializeCatalog } from '@studyplan/shared';
import type { CourseCatalog } from '@studyplan/shared';

import { CatalogLoadError } from './errors.js';

export async function loadCatalogFile(path: string): Promise<CourseCatalog> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'file not readable';
    throw new CatalogLoadError(path, message);
  }

  try {
    return parseCatalog(text);
  } catch (error) {
    if (error instanceof CatalogValidationError) {
      throw new CatalogLoadError(path, error.message);
    }
    throw error;
  }
}

export async function saveCatalogFile(path: string, catalog: CourseCatalog): Promise<void> {
  await writeFile(path, `${serializeCatalog(catalog)}\n`, 'utf8');
}
