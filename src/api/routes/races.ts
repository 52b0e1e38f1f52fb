import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { RaceStore } from '../../types/store.js';
import { isIsoDate } from '../../utils/date.js';

const listQuerySchema = z.object({
  date: z.string().refine(isIsoDate, { message: 'Expected YYYY-MM-DD' }).optional(),
  discipline: z.enum(['thoroughbred', 'greyhound', 'harness']).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export interface RacesRouteOptions {
  store: RaceStore;
}

export const racesRoutes: FastifyPluginAsync<RacesRouteOptions> = async (app, { store }) => {
  // GET /races?date=&discipline=&limit=, best value first
  app.get('/', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid query', issues: query.error.issues.map((i) => i.message) });
    }
    const races = await store.listRaces(query.data);
    return { data: races, count: races.length };
  });

  app.get<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const race = await store.getRace(request.params.id);
    if (!race) return reply.code(404).send({ error: 'Race not found' });
    return { data: race };
  });
};
