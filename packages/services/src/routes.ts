import { findPath, resolveCell } from '@isoroute/core';
import type { CellPosition, RouteMap } from '@isoroute/core';
import { loadRouteMap, loadRouteScenario, renderPath, terrainRows } from '@isoroute/data';
import type { FastifyInstance } from 'fastify';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { ServiceConfig } from './config.js';

const cellSchema = z.object({
  x: z.number().int(),
  y: z.number().int()
});

const layersSchema = z.object({
  terrain: z.string(),
  elevation: z.string().optional(),
  priority: z.string().optional(),
  points: z.string().optional()
});

const resolveCellSchema = z.object({
  point: z.object({ x: z.number(), y: z.number() }),
  map: layersSchema.omit({ points: true }),
  elevation: z.number().int().optional()
});

const routeQuerySchema = z
  .object({
    map: layersSchema,
    start: cellSchema.optional(),
    goal: cellSchema.optional(),
    mode: z.enum(['dijkstra', 'astar']).default('astar'),
    movement: z.enum(['four', 'eight']).default('four'),
    priorityWeight: z.number().nonnegative().default(0),
    costCap: z.number().positive().optional(),
    maxExpansions: z.number().int().nonnegative().optional()
  })
  .refine((query) => (query.start === undefined) === (query.goal === undefined), {
    message: 'start and goal must be given together',
    path: ['goal']
  });

export type RouteQuery = z.infer<typeof routeQuerySchema>;

interface QueryMap {
  map: RouteMap;
  start: CellPosition;
  goal: CellPosition;
}

function queryMap(query: RouteQuery, config: ServiceConfig): QueryMap {
  if (query.start && query.goal) {
    return { map: loadRouteMap(query.map, config.terrain), start: query.start, goal: query.goal };
  }
  return loadRouteScenario(query.map, config.terrain);
}

export function registerRoutes(app: FastifyInstance, config: ServiceConfig): void {
  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/cells/resolve', async (request) => {
    const body = resolveCellSchema.parse(request.body);
    const map = loadRouteMap(body.map, config.terrain);
    return resolveCell(body.point, map, config.iso, { elevation: body.elevation });
  });

  app.post('/routes', async (request) => {
    const query = routeQuerySchema.parse(request.body);
    const { map, start, goal } = queryMap(query, config);
    const queryId = nanoid();

    const result = findPath(map, start, goal, config.terrain, {
      mode: query.mode,
      movement: query.movement,
      priorityWeight: query.priorityWeight,
      costCap: query.costCap,
      maxExpansions: query.maxExpansions
    });

    request.log.info(
      {
        queryId,
        mode: result.mode,
        success: result.success,
        reason: result.success ? undefined : result.reason,
        ...result.stats
      },
      'route query'
    );

    return {
      queryId,
      success: result.success,
      mode: result.mode,
      path: result.path,
      cost: result.success ? result.cost : null,
      reason: result.success ? undefined : result.reason,
      stats: result.stats,
      rendered: renderPath(terrainRows(map), result.path, config.terrain)
    };
  });
}
