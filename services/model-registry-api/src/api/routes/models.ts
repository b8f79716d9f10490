import { pipeline } from 'node:stream/promises';
import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { ModelNotFoundError } from '../../errors/http-errors.js';
import { resolveModelFile } from '../../services/model-files.js';
import { ModelMetadata, ModelStore, StoredModel } from '../../types/index.js';
import {
  listModelsQuerySchema,
  modelReferenceSchema,
  storeModelSchema,
  validateInput,
} from '../../validation/schemas.js';

export interface ModelRouteOptions {
  /** Confine `modelPath` to this directory */
  modelRoot?: string;
}

function describeFile(model: StoredModel) {
  return {
    id: model.id,
    filename: model.filename,
    length: model.length,
    uploadDate: model.uploadDate
  };
}

/**
 * Create model registry routes
 * @param modelStore - Storage backend for model files and metadata
 * @param authenticate - Basic auth middleware
 * @returns Express router with model endpoints
 */
export function createModelRoutes(
  modelStore: ModelStore,
  authenticate: RequestHandler,
  options: ModelRouteOptions = {}
): Router {
  const router = Router();

  /**
   * Store a model file from the service host with its metadata
   */
  router.post('/store_model', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = validateInput(storeModelSchema(req.body));
      const metadata: ModelMetadata = {
        model_architecture: body.modelArchitecture,
        model_version: body.modelVersion,
        project_name: body.project_name
      };

      const file = await resolveModelFile(body.modelPath, options.modelRoot);
      console.log(`📦 Storing ${file.filename} (${file.size} bytes) in ${body.database}.${body.collection}`);

      const stored = await modelStore.storeModel(
        { database: body.database, collection: body.collection },
        metadata,
        file
      );

      if (stored) {
        res.json({
          success: true,
          message: 'Model stored successfully.',
          data: { stored: true, model: stored },
          timestamp: new Date().toISOString()
        });
      } else {
        res.json({
          success: true,
          message: 'Model already exists or could not be stored.',
          data: { stored: false },
          timestamp: new Date().toISOString()
        });
      }
    } catch (error) {
      next(error);
    }
  });

  /**
   * Delete a model by its ID
   */
  router.delete('/delete_model', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { database, collection, modelId } = validateInput(modelReferenceSchema(req.body));

      await modelStore.deleteModel({ database, collection }, modelId);

      res.json({
        success: true,
        message: `Model with ID '${modelId}' deleted successfully.`,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Look up a model's metadata by ID
   */
  router.post('/search_model', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { database, collection, modelId } = validateInput(modelReferenceSchema(req.body));

      const model = await modelStore.findModel({ database, collection }, modelId);
      if (!model) {
        throw new ModelNotFoundError();
      }

      res.json({
        success: true,
        data: { model: model.metadata },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Metadata plus the stored file's description
   */
  router.post('/get_model', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { database, collection, modelId } = validateInput(modelReferenceSchema(req.body));

      const model = await modelStore.findModel({ database, collection }, modelId);
      if (!model) {
        throw new ModelNotFoundError();
      }

      res.json({
        success: true,
        data: { model: model.metadata, file: describeFile(model) },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * List models in a bucket, newest first
   */
  router.get('/list_models', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = validateInput(listModelsQuerySchema(req.query));

      const models = await modelStore.listModels(
        { database: query.database, collection: query.collection },
        { projectName: query.project_name }
      );

      res.json({
        success: true,
        data: { count: models.length, models },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Stream the stored model file
   */
  router.get('/download_model', authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { database, collection, modelId } = validateInput(modelReferenceSchema(req.query));

      const download = await modelStore.openDownload({ database, collection }, modelId);

      res.attachment(download.model.filename);
      res.set({
        'Content-Type': 'application/octet-stream',
        'Content-Length': download.model.length.toString()
      });
      await pipeline(download.stream, res);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
