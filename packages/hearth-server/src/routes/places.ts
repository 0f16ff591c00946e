import { FastifyInstance } from 'fastify';
import { ObjectStore, Place, RelationshipResolver } from 'hearth-storage';
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

// Owner and city are fixed once the place exists
const IGNORED_ON_UPDATE = [...PROTECTED_KEYS, 'user_id', 'city_id'];

/**
 * Places are listed and created under their city; the owner comes from the body
 */
export async function registerPlaceRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  const relations = new RelationshipResolver(store);

  app.get<{ Params: { city_id: string } }>('/cities/:city_id/places', async (request, reply) => {
    const city = store.get('City', request.params.city_id);
    if (!city) return notFound(reply);
    return relations.placesOf(city).map(place => place.toDict());
  });

  app.post<{ Params: { city_id: string } }>('/cities/:city_id/places', async (request, reply) => {
    const city = store.get('City', request.params.city_id);
    if (!city) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    if (missingField(body, ['user_id'])) return badRequest(reply, 'Missing user_id');
    const owner = typeof body.user_id === 'string' ? store.get('User', body.user_id) : null;
    if (!owner) return notFound(reply);

    if (missingField(body, ['name'])) return badRequest(reply, 'Missing name');

    const place = new Place({ ...body, city_id: city.id, user_id: owner.id });
    await persistNew(store, place);
    return reply.code(201).send(place.toDict());
  });

  app.get<{ Params: { place_id: string } }>('/places/:place_id', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);
    return place.toDict();
  });

  app.delete<{ Params: { place_id: string } }>('/places/:place_id', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);
    return persistDelete(store, place);
  });

  app.put<{ Params: { place_id: string } }>('/places/:place_id', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    place.update(without(body, IGNORED_ON_UPDATE));
    await store.save();
    return place.toDict();
  });
}
