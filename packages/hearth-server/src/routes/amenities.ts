import { FastifyInstance } from 'fastify';
import { Amenity, ObjectStore } from 'hearth-storage';
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

interface AmenityParams {
  amenity_id: string;
}

export async function registerAmenityRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  app.get('/amenities', async () => [...store.all('Amenity').values()].map(amenity => amenity.toDict()));

  app.get<{ Params: AmenityParams }>('/amenities/:amenity_id', async (request, reply) => {
    const amenity = store.get('Amenity', request.params.amenity_id);
    if (!amenity) return notFound(reply);
    return amenity.toDict();
  });

  app.delete<{ Params: AmenityParams }>('/amenities/:amenity_id', async (request, reply) => {
    const amenity = store.get('Amenity', request.params.amenity_id);
    if (!amenity) return notFound(reply);
    return persistDelete(store, amenity);
  });

  app.post('/amenities', async (request, reply) => {
    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    const missing = missingField(body, ['name']);
    if (missing) return badRequest(reply, `Missing ${missing}`);

    const amenity = new Amenity(body);
    await persistNew(store, amenity);
    return reply.code(201).send(amenity.toDict());
  });

  app.put<{ Params: AmenityParams }>('/amenities/:amenity_id', async (request, reply) => {
    const amenity = store.get('Amenity', request.params.amenity_id);
    if (!amenity) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    amenity.update(without(body, PROTECTED_KEYS));
    await store.save();
    return amenity.toDict();
  });
}
