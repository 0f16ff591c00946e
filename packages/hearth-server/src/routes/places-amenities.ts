/**
 * Place ↔ Amenity links
 *
 * GET    /places/:place_id/amenities              linked amenities, in link order
 * POST   /places/:place_id/amenities/:amenity_id  200 if already linked, 201 if new
 * DELETE /places/:place_id/amenities/:amenity_id  404 if not linked
 */

import { FastifyInstance } from 'fastify';
import { ObjectStore, RelationshipResolver } from 'hearth-storage';
import { notFound } from './helpers';

interface LinkParams {
  place_id: string;
  amenity_id: string;
}

export async function registerPlaceAmenityRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  const relations = new RelationshipResolver(store);

  app.get<{ Params: { place_id: string } }>('/places/:place_id/amenities', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);
    return relations.amenitiesOf(place).map(amenity => amenity.toDict());
  });

  app.post<{ Params: LinkParams }>('/places/:place_id/amenities/:amenity_id', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    const amenity = store.get('Amenity', request.params.amenity_id);
    if (!place || !amenity) return notFound(reply);

    if (!relations.linkAmenity(place, amenity)) {
      return amenity.toDict();
    }
    await store.save();
    return reply.code(201).send(amenity.toDict());
  });

  app.delete<{ Params: LinkParams }>('/places/:place_id/amenities/:amenity_id', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    const amenity = store.get('Amenity', request.params.amenity_id);
    if (!place || !amenity) return notFound(reply);

    if (!relations.unlinkAmenity(place, amenity)) return notFound(reply);
    await store.save();
    return {};
  });
}
