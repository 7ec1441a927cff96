import {
  SYSTEM_OWNER,
  op,
  type OperationRegistry,
  type RegistryResult
} from "@opsreg/core";
import type { Request, RequestHandler, Response, Router } from "express";
import { z } from "zod";
import type { ApiConfig } from "../config";
import { readCaller, requireAdminToken } from "../lib/admin-auth";
import { asyncHandler } from "../lib/async-handler";

const listQuerySchema = z.object({
  tag: z.string().trim().min(1).optional()
});

const ownerSchema = z.string().trim().min(1).optional();

const registerBodySchema = z.object({
  owner: ownerSchema,
  ops: z.array(z.unknown()).min(1, "ops must contain at least one operation")
});

const deleteBodySchema = z.object({
  owner: ownerSchema,
  op: z.record(z.unknown())
});

const FAILURE_STATUS: Record<string, number> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  STORE_UNAVAILABLE: 503
};

function sendResult<T>(res: Response, result: RegistryResult<T>): void {
  if (result.success) {
    res.json(result);
    return;
  }
  res.status(FAILURE_STATUS[result.code] ?? 500).json(result);
}

/**
 * HTTP handlers for the registry. Each handler carries its own declaration, so scanning this
 * service registers the registry's operations alongside everyone else's.
 */
export class OperationsController {
  constructor(private readonly registry: OperationRegistry) {}

  @op({
    path: "/api/ops",
    name: "listOperations",
    method: "GET",
    description: "List the operations available to the caller for a tag, followed by shared system operations.",
    tags: ["registry"],
    params: { tag: "Tag to list. Defaults to default." }
  })
  async list(req: Request, res: Response): Promise<void> {
    const caller = readCaller(req);
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_OPS_QUERY", details: parsed.error.flatten() });
      return;
    }

    sendResult(res, await this.registry.listOperations(caller, parsed.data.tag));
  }

  @op({
    path: "/api/ops/all",
    name: "listAllOperations",
    method: "GET",
    description: "List every system operation regardless of tag.",
    tags: ["registry", "admin"],
    params: {}
  })
  async listAll(_req: Request, res: Response): Promise<void> {
    sendResult(res, await this.registry.listAllOperations());
  }

  @op({
    path: "/api/ops",
    name: "registerOperations",
    description: "Validate operation records and publish them under each of their tags.",
    tags: ["registry", "admin"],
    params: {
      owner: "Owner to register for. Defaults to system.",
      ops: "Operation records to register."
    }
  })
  async register(req: Request, res: Response): Promise<void> {
    const parsed = registerBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_OPS_BODY", details: parsed.error.flatten() });
      return;
    }

    sendResult(res, await this.registry.registerOperations(parsed.data.owner ?? SYSTEM_OWNER, parsed.data.ops));
  }

  @op({
    path: "/api/ops/delete",
    name: "deleteOperation",
    description: "Remove an operation, matched on id, name and url, from each of its tags.",
    tags: ["registry", "admin"],
    params: {
      owner: "Owner to delete for. Defaults to system.",
      op: "Reference with id, name, url and optional tags."
    }
  })
  async remove(req: Request, res: Response): Promise<void> {
    const parsed = deleteBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_OPS_BODY", details: parsed.error.flatten() });
      return;
    }

    sendResult(res, await this.registry.deleteOperation(parsed.data.owner ?? SYSTEM_OWNER, parsed.data.op));
  }
}

/**
 * Mounts the registry routes. `writeLimiter` runs in front of the two write routes only.
 */
export function registerOpsRoutes(
  router: Router,
  deps: { config: ApiConfig; registry: OperationRegistry; writeLimiter?: RequestHandler }
): void {
  const controller = new OperationsController(deps.registry);
  const requireAdmin = requireAdminToken(deps.config.adminToken);
  const writeGuards: RequestHandler[] = deps.writeLimiter ? [deps.writeLimiter, requireAdmin] : [requireAdmin];

  router.get("/api/ops", asyncHandler((req, res) => controller.list(req, res)));
  router.get("/api/ops/all", requireAdmin, asyncHandler((req, res) => controller.listAll(req, res)));
  router.post("/api/ops", ...writeGuards, asyncHandler((req, res) => controller.register(req, res)));
  router.post("/api/ops/delete", ...writeGuards, asyncHandler((req, res) => controller.remove(req, res)));
}
