import { FastifyInstance } from 'fastify';
import { City, ObjectStore, RelationshipResolver } from 'hearth-storage';
import {
  PROTECTED_KEYS,
  badRequest,
  missingField,
  notFound,
  persistDelete,
  persistNew,
  readJsonObject,
  without
} from './helpers';

const IGNORED_ON_UPDATE = [...PROTECTED_KEYS, 'state_id'];

/**
 * Cities are listed and created under their state
 */
export async function registerCityRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  const relations = new RelationshipResolver(store);

  app.get<{ Params: { state_id: string } }>('/states/:state_id/cities', async (request, reply) => {
    const state = store.get('State', request.params.state_id);
    if (!state) return notFound(reply);
    return relations.citiesOf(state).map(city => city.toDict());
  });

  app.post<{ Params: { state_id: string } }>('/states/:state_id/cities', async (request, reply) => {
    const state = store.get('State', request.params.state_id);
    if (!state) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    const missing = missingField(body, ['name']);
    if (missing) return badRequest(reply, `Missing ${missing}`);

    const city = new City({ ...body, state_id: state.id });
    await persistNew(store, city);
    return reply.code(201).send(city.toDict());
  });

  app.get<{ Params: { city_id: string } }>('/cities/:city_id', async (request, reply) => {
    const city = store.get('City', request.params.city_id);
    if (!city) return notFound(reply);
    return city.toDict();
  });

  app.delete<{ Params: { city_id: string } }>('/cities/:city_id', async (request, reply) => {
    const city = store.get('City', request.params.city_id);
    if (!city) return notFound(reply);
    return persistDelete(store, city);
  });

  app.put<{ Params: { city_id: string } }>('/cities/:city_id', async (request, reply) => {
    const city = store.get('City', request.params.city_id);
    if (!city) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    city.update(without(body, IGNORED_ON_UPDATE));
    await store.save();
    return city.toDict();
  });
}
