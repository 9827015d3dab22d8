/**
 * Express routes for the access control engine, mounted at `/api/access`.
 *
 * The caller is named by the `x-user-id` header, set by the authenticating
 * proxy in front of this service, and resolved through the user directory.
 * Every handler runs with that user bound as the current identity.
 *
 * @module http/accessRouter
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { AccessEvaluationService } from '../access/accessEvaluationService.js';
import type { RoleAssignmentManager } from '../access/roleAssignmentManager.js';
import type { DirectoryIdentityProvider } from '../identity/directoryIdentityProvider.js';
import {
  parseAssignmentBody,
  parseElevationBody,
  parseEvaluateBody,
  parseEvaluateManyBody,
  parsePermissionBody,
  parsePermissionParam,
  parseReviewBody,
  parseRevocationBody,
  parseRoleParam,
} from './requestParsers.js';
import { serializePermissionResult } from './responses.js';

export const USER_ID_HEADER = 'x-user-id';

export interface AccessRouterDependencies {
  evaluation: AccessEvaluationService;
  assignments: RoleAssignmentManager;
  identity: DirectoryIdentityProvider;
}

interface RouteResult {
  status: number;
  body: { success: true } & Record<string, unknown>;
}

/** Wrap an async route so rejections reach the error middleware. */
function route(handler: (req: Request) => Promise<RouteResult>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req).then(
      (result) => {
        res.status(result.status).json(result.body);
      },
      (err: unknown) => next(err),
    );
  };
}

function ok(payload: Record<string, unknown>, status = 200): RouteResult {
  return { status, body: { success: true, ...payload } };
}

/**
 * Create the router. The returned router binds the caller identity for
 * every request before any route runs.
 */
export function createAccessRouter(deps: AccessRouterDependencies): express.Router {
  const { evaluation, assignments, identity } = deps;
  const router = express.Router();

  router.use((req: Request, _res: Response, next: NextFunction) => {
    const header = req.get(USER_ID_HEADER)?.trim();
    identity.runAs(header ? header : null, () => next());
  });

  // ── Evaluation ────────────────────────────────────────────────────────

  router.post(
    '/evaluate',
    route(async (req) => {
      const input = parseEvaluateBody(req.body);
      const context = await evaluation.createContext(input.context);
      const result = await evaluation.evaluate(input.permission, context);
      return ok({ result: serializePermissionResult(result) });
    }),
  );

  router.post(
    '/evaluate-many',
    route(async (req) => {
      const input = parseEvaluateManyBody(req.body);
      const context = await evaluation.createContext(input.context);
      const results = await evaluation.evaluateMany(input.permissions, context);
      const body: Record<string, ReturnType<typeof serializePermissionResult>> = {};
      for (const [permission, result] of results) {
        body[permission] = serializePermissionResult(result);
      }
      return ok({ results: body });
    }),
  );

  router.get(
    '/permissions',
    route(async () => ok({ permissions: await evaluation.getCurrentUserPermissions() })),
  );

  router.get(
    '/permissions/by-category',
    route(async () => ok({ categories: await evaluation.getPermissionsByCategory() })),
  );

  router.get(
    '/roles/hierarchy',
    route(async () => ok({ roles: await evaluation.getCurrentUserRoleHierarchy() })),
  );

  // ── Role Definitions ──────────────────────────────────────────────────

  router.post(
    '/roles/:role/permissions',
    route(async (req) => {
      const role = parseRoleParam(req.params['role']);
      const permission = parsePermissionBody(req.body);
      await evaluation.grantPermissionToRole(permission, role);
      return ok({ role, permission });
    }),
  );

  router.delete(
    '/roles/:role/permissions/:permission',
    route(async (req) => {
      const role = parseRoleParam(req.params['role']);
      const permission = parsePermissionParam(req.params['permission']);
      await evaluation.revokePermissionFromRole(permission, role);
      return ok({ role, permission });
    }),
  );

  // ── Assignments ───────────────────────────────────────────────────────

  router.post(
    '/assignments',
    route(async (req) => {
      const input = parseAssignmentBody(req.body);
      const assignment = await assignments.assignRole(input.role, input.userId, input.options);
      return ok({ assignment }, 201);
    }),
  );

  router.post(
    '/assignments/revoke',
    route(async (req) => {
      const input = parseRevocationBody(req.body);
      const assignment = await assignments.revokeRole(input.role, input.userId, input.reason);
      return ok({ assignment });
    }),
  );

  // ── Elevation ─────────────────────────────────────────────────────────

  router.post(
    '/elevations',
    route(async (req) => {
      const input = parseElevationBody(req.body);
      const request = await assignments.requestElevation(
        input.role,
        input.durationMs,
        input.reason,
      );
      return ok({ request }, 201);
    }),
  );

  router.post(
    '/elevations/:id/review',
    route(async (req) => {
      const input = parseReviewBody(req.body);
      const request = await assignments.reviewElevation(
        req.params['id'] ?? '',
        input.approve,
        input.notes,
      );
      return ok({ request });
    }),
  );

  // ── Maintenance ───────────────────────────────────────────────────────

  router.post(
    '/maintenance/cleanup',
    route(async () => {
      await evaluation.requirePermission('assign_role', 'run assignment cleanup');
      const summary = await assignments.cleanupExpiredAssignments();
      return ok({ summary });
    }),
  );

  return router;
}
