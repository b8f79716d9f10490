import type { Readable } from 'node:stream';

// Registry Types
export interface ModelLocation {
  database: string;
  collection: string;
}

export interface ModelMetadata {
  model_architecture: string;
  model_version: number;
  project_name: string;
}

export interface StoredModel {
  id: string;
  filename: string;
  length: number;
  uploadDate: string;
  metadata: ModelMetadata;
}

export interface ModelFile {
  path: string;
  filename: string;
  size: number;
}

export interface ModelDownload {
  model: StoredModel;
  stream: Readable;
}

export interface ListModelsFilter {
  projectName?: string;
}

/**
 * Persistence seam for model files and their metadata.
 * The service uses GridFS; tests substitute an in-memory store.
 */
export interface ModelStore {
  /** Returns null when a model with the same metadata is already stored */
  storeModel(location: ModelLocation, metadata: ModelMetadata, file: ModelFile): Promise<StoredModel | null>;
  deleteModel(location: ModelLocation, modelId: string): Promise<void>;
  findModel(location: ModelLocation, modelId: string): Promise<StoredModel | null>;
  listModels(location: ModelLocation, filter?: ListModelsFilter): Promise<StoredModel[]>;
  openDownload(location: ModelLocation, modelId: string): Promise<ModelDownload>;
}

// User administration
export interface MongoRoleGrant {
  role: string;
  db: string;
}

/**
 * Runs an administrative command against a named database
 */
export interface DatabaseCommandRunner {
  runCommand(database: string, command: Record<string, unknown>): Promise<Record<string, unknown>>;
}

export interface DatabaseHealthProbe {
  /** Resolves with the round-trip latency in milliseconds */
  ping(): Promise<number>;
}

// Response envelope
export interface ServiceResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  errorId?: string;
  timestamp?: string;
}

export interface StoreModelResult {
  stored: boolean;
  model?: StoredModel;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  database: {
    connected: boolean;
    latencyMs?: number;
    error?: string;
  };
  errors: {
    total: number;
    unresolved: number;
  };
}
