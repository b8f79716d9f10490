import { createReadStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import type { Readable, Writable } from 'node:stream';
import {
  GridFSBucket,
  ObjectId,
  type Db,
  type Filter,
  type GridFSBucketWriteStreamOptions,
  type GridFSFile,
  type FindOptions,
} from 'mongodb';
import { type } from 'arktype';
import { InvalidModelIdError, ModelNotFoundError } from '../errors/http-errors.js';
import {
  ListModelsFilter,
  ModelDownload,
  ModelFile,
  ModelLocation,
  ModelMetadata,
  ModelStore,
  StoredModel,
} from '../types/index.js';

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

const storedMetadataSchema = type({
  model_architecture: 'string',
  model_version: 'number',
  project_name: 'string',
});

export interface DatabaseProvider {
  db(name: string): Db;
}

/** The part of `GridFSBucket` the store relies on */
export interface ModelBucket {
  find(
    filter: Filter<GridFSFile>,
    options?: FindOptions
  ): { toArray(): Promise<GridFSFile[]>; next(): Promise<GridFSFile | null> };
  openUploadStream(filename: string, options?: GridFSBucketWriteStreamOptions): Writable & { id: ObjectId };
  openDownloadStream(id: ObjectId): Readable;
  delete(id: ObjectId): Promise<void>;
}

export type BucketFactory = (location: ModelLocation) => ModelBucket;

/**
 * Each registry collection is a GridFS bucket in the named database
 */
export function gridFsBuckets(provider: DatabaseProvider): BucketFactory {
  return (location) => new GridFSBucket(provider.db(location.database), { bucketName: location.collection });
}

export function parseModelId(modelId: string): ObjectId {
  if (!OBJECT_ID_PATTERN.test(modelId)) {
    throw new InvalidModelIdError(modelId);
  }
  return new ObjectId(modelId);
}

export function toStoredModel(file: GridFSFile): StoredModel {
  const metadata = storedMetadataSchema(file.metadata ?? {});
  if (metadata instanceof type.errors) {
    throw new Error(`Stored model ${file._id.toHexString()} has malformed metadata: ${metadata.summary}`);
  }
  return {
    id: file._id.toHexString(),
    filename: file.filename,
    length: file.length,
    uploadDate: file.uploadDate.toISOString(),
    metadata,
  };
}

/**
 * Keeps model files in GridFS. Each registry collection is a bucket, so a
 * model lives in `<collection>.files` / `<collection>.chunks` with its
 * metadata on the files document.
 */
export class GridFsModelStore implements ModelStore {
  private readonly buckets: BucketFactory;

  constructor(buckets: BucketFactory) {
    this.buckets = buckets;
  }

  async storeModel(location: ModelLocation, metadata: ModelMetadata, file: ModelFile): Promise<StoredModel | null> {
    const bucket = this.buckets(location);

    const duplicate = await bucket.find(metadataFilter(metadata), { limit: 1 }).toArray();
    if (duplicate.length > 0) {
      console.log(
        `Model ${metadata.project_name}/${metadata.model_architecture} v${metadata.model_version} ` +
        `already stored as ${duplicate[0]._id.toHexString()}`
      );
      return null;
    }

    const upload = bucket.openUploadStream(file.filename, { metadata: { ...metadata } });
    await pipeline(createReadStream(file.path), upload);

    const stored = await bucket.find({ _id: upload.id }, { limit: 1 }).next();
    if (!stored) {
      throw new Error(`Upload of ${file.filename} finished but no files document was written`);
    }
    return toStoredModel(stored);
  }

  async deleteModel(location: ModelLocation, modelId: string): Promise<void> {
    const id = parseModelId(modelId);
    const bucket = this.buckets(location);
    const existing = await bucket.find({ _id: id }, { limit: 1 }).next();
    if (!existing) {
      throw new ModelNotFoundError();
    }
    await bucket.delete(id);
  }

  async findModel(location: ModelLocation, modelId: string): Promise<StoredModel | null> {
    const id = parseModelId(modelId);
    const file = await this.buckets(location).find({ _id: id }, { limit: 1 }).next();
    return file ? toStoredModel(file) : null;
  }

  async listModels(location: ModelLocation, filter: ListModelsFilter = {}): Promise<StoredModel[]> {
    const query: Filter<GridFSFile> = filter.projectName ? { 'metadata.project_name': filter.projectName } : {};
    const files = await this.buckets(location).find(query, { sort: { uploadDate: -1 } }).toArray();
    return files.map(toStoredModel);
  }

  async openDownload(location: ModelLocation, modelId: string): Promise<ModelDownload> {
    const id = parseModelId(modelId);
    const bucket = this.buckets(location);
    const file = await bucket.find({ _id: id }, { limit: 1 }).next();
    if (!file) {
      throw new ModelNotFoundError();
    }
    return { model: toStoredModel(file), stream: bucket.openDownloadStream(id) };
  }
}

function metadataFilter(metadata: ModelMetadata): Filter<GridFSFile> {
  return {
    'metadata.project_name': metadata.project_name,
    'metadata.model_architecture': metadata.model_architecture,
    'metadata.model_version': metadata.model_version,
  };
}
