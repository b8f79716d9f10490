/**
 * Model Registry Client
 * Typed wrapper over the registry's HTTP API
 */

import axios, { AxiosInstance, isAxiosError } from "axios";
import type { ModelMetadata, ServiceResponse, StoredModel, StoreModelResult } from "../types/index.js";

/* ---------- Request Types ---------- */
export interface CreateUserInput {
  username: string;
  password: string;
  role: string;
  database: string;
}

export interface StoreModelInput {
  database: string;
  collection: string;
  modelPath: string;
  modelArchitecture: string;
  modelVersion: number;
  project_name: string;
}

export interface ModelReference {
  modelId: string;
  database?: string;
  collection?: string;
}

export interface ModelFileInfo {
  id: string;
  filename: string;
  length: number;
  uploadDate: string;
}

export interface ClientOptions {
  baseURL?: string;
  username: string;
  password: string;
  timeout?: number;
}

/* ---------- Client Class ---------- */
export class ModelRegistryClient {
  private client: AxiosInstance;

  constructor(options: ClientOptions) {
    if (!options.username || !options.password) {
      throw new Error("Username and password are required to initialize ModelRegistryClient.");
    }

    const baseURL =
      options.baseURL ||
      process.env["MODEL_REGISTRY_URL"] ||
      "http://localhost:8000";

    this.client = axios.create({
      baseURL,
      timeout: options.timeout ?? 30000,
      auth: { username: options.username, password: options.password },
      headers: {
        "Content-Type": "application/json",
        "User-Agent": "ModelRegistryClient/1.0.0",
      },
    });
  }

  /* ---------- Internal request ---------- */
  private async makeRequest<T>(
    method: "get" | "post" | "delete",
    url: string,
    options: { data?: object; params?: object } = {}
  ): Promise<ServiceResponse<T>> {
    try {
      const response = await this.client.request<ServiceResponse<T>>({
        method,
        url,
        data: options.data,
        params: options.params,
      });
      return response.data;
    } catch (error) {
      if (isAxiosError<ServiceResponse>(error) && error.response) {
        return {
          success: false,
          message: error.response.data?.message || error.message,
          error: error.response.data?.error || `HTTP ${error.response.status}`,
          errorId: error.response.data?.errorId,
        };
      }
      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        error: "Network Error",
      };
    }
  }

  /* ---------- User Methods ---------- */
  async createUser(input: CreateUserInput): Promise<ServiceResponse<never>> {
    return this.makeRequest("post", "/create_user", { data: input });
  }

  async deleteUser(username: string, database: string): Promise<ServiceResponse<never>> {
    return this.makeRequest("delete", "/delete_user", { data: { username, database } });
  }

  async generatePassword(length = 12, specialChars = false): Promise<string | null> {
    const res = await this.makeRequest<{ password: string }>("get", "/generate_password", {
      params: { length, special_chars: specialChars },
    });
    return res.success ? res.data?.password ?? null : null;
  }

  /* ---------- Model Methods ---------- */
  async storeModel(input: StoreModelInput): Promise<ServiceResponse<StoreModelResult>> {
    return this.makeRequest("post", "/store_model", { data: input });
  }

  async deleteModel(ref: ModelReference): Promise<ServiceResponse<never>> {
    return this.makeRequest("delete", "/delete_model", { data: ref });
  }

  async searchModel(ref: ModelReference): Promise<ModelMetadata | null> {
    const res = await this.makeRequest<{ model: ModelMetadata }>("post", "/search_model", { data: ref });
    return res.success ? res.data?.model ?? null : null;
  }

  async getModel(ref: ModelReference): Promise<{ model: ModelMetadata; file: ModelFileInfo } | null> {
    const res = await this.makeRequest<{ model: ModelMetadata; file: ModelFileInfo }>("post", "/get_model", {
      data: ref,
    });
    return res.success ? res.data ?? null : null;
  }

  async listModels(database?: string, collection?: string, projectName?: string): Promise<StoredModel[]> {
    const res = await this.makeRequest<{ count: number; models: StoredModel[] }>("get", "/list_models", {
      params: { database, collection, project_name: projectName },
    });
    return res.success ? res.data?.models ?? [] : [];
  }

  async downloadModel(ref: ModelReference): Promise<Buffer | null> {
    try {
      const res = await this.client.get<ArrayBuffer>("/download_model", {
        params: ref,
        responseType: "arraybuffer",
      });
      return Buffer.from(res.data);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw error;
    }
  }

  /* ---------- Health Check ---------- */
  async checkHealth(): Promise<boolean> {
    try {
      const res = await this.client.get<{ status: string }>("/health");
      return res.status === 200 && res.data.status === "healthy";
    } catch {
      return false;
    }
  }
}
