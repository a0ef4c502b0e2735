// src/controllers/Dataset.controller.ts
import "reflect-metadata";
import { Request, Response } from "express";
import { controller, httpDelete, httpGet, httpPost, httpPut, interfaces } from "inversify-express-utils";
import { AuthMiddleware, OptionalAuthMiddleware } from "../middleware/Auth.middleware";
import DatasetService from "../services/Dataset.service";
import { Dataset } from "../interfaces/dataset.interface";
import { ForbiddenError, NotFoundError, ValidationError } from "../utils/errors";

function currentUserId(req: Request): string {
  if (!req.user) throw new ForbiddenError("Not authenticated");
  return req.user.id;
}

// private datasets are only visible to their author
function visibleTo(dataset: Dataset | null, req: Request): Dataset | null {
  if (!dataset) return null;
  if (dataset.public || dataset.author === req.user?.id) return dataset;
  return null;
}

function sendError(res: Response, err: unknown, fallback: string) {
  if (err instanceof ValidationError) {
    return res.status(400).json({ error: "ValidationError", issues: err.issues });
  }
  if (err instanceof NotFoundError) return res.status(404).json({ error: err.message });
  if (err instanceof ForbiddenError) return res.status(403).json({ error: err.message });

  console.error(fallback, err);
  return res.status(500).json({ error: fallback });
}

@controller("/datasets")
export default class DatasetController implements interfaces.Controller {
  constructor(private datasets: DatasetService) { }

  @httpPost("/", AuthMiddleware)
  async create(req: Request, res: Response) {
    try {
      const id = await this.datasets.create(req.body, currentUserId(req));
      return res.status(201).json({ id });
    } catch (err) {
      return sendError(res, err, "Create dataset failed");
    }
  }

  // GET /datasets?author=userId
  @httpGet("/", OptionalAuthMiddleware)
  async listByAuthor(req: Request, res: Response) {
    try {
      const { author } = req.query;
      if (typeof author !== "string" || !author) {
        return res.status(400).json({ error: "Missing author" });
      }
      // owners see their private datasets too
      const publicOnly = req.user?.id !== author;
      const datasets = await this.datasets.getByOwner(author, publicOnly);
      return res.json({ datasets });
    } catch (err) {
      return sendError(res, err, "Failed to list datasets");
    }
  }

  @httpGet("/:datasetId", OptionalAuthMiddleware)
  async get(req: Request, res: Response) {
    try {
      const dataset = visibleTo(await this.datasets.get(req.params.datasetId), req);
      if (!dataset) return res.status(404).json({ error: "Dataset not found" });
      return res.json(dataset);
    } catch (err) {
      return sendError(res, err, "Failed to fetch dataset");
    }
  }

  @httpGet("/:datasetId/completeness", OptionalAuthMiddleware)
  async completeness(req: Request, res: Response) {
    try {
      const { datasetId } = req.params;
      if (!visibleTo(await this.datasets.get(datasetId), req)) {
        return res.status(404).json({ error: "Dataset not found" });
      }
      return res.json(await this.datasets.checkComplete(datasetId));
    } catch (err) {
      return sendError(res, err, "Failed to check dataset");
    }
  }

  @httpPut("/:datasetId", AuthMiddleware)
  async update(req: Request, res: Response) {
    try {
      const { datasetId } = req.params;
      const userId = currentUserId(req);
      await this.datasets.update(datasetId, req.body, userId, { requireAuthor: userId });
      return res.json({ ok: true });
    } catch (err) {
      return sendError(res, err, "Update dataset failed");
    }
  }

  @httpDelete("/:datasetId", AuthMiddleware)
  async remove(req: Request, res: Response) {
    try {
      const { datasetId } = req.params;
      // already gone is fine too
      await this.datasets.delete(datasetId, { requireAuthor: currentUserId(req) });
      return res.json({ ok: true });
    } catch (err) {
      return sendError(res, err, "Delete dataset failed");
    }
  }

}
