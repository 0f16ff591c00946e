import { FastifyInstance } from 'fastify';
import { ObjectStore, RelationshipResolver, Review } from 'hearth-storage';
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

const IGNORED_ON_UPDATE = [...PROTECTED_KEYS, 'place_id', 'user_id'];

/**
 * Reviews are listed and created under their place; the author comes from the body
 */
export async function registerReviewRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  const relations = new RelationshipResolver(store);

  app.get<{ Params: { place_id: string } }>('/places/:place_id/reviews', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);
    return relations.reviewsOf(place).map(review => review.toDict());
  });

  app.post<{ Params: { place_id: string } }>('/places/:place_id/reviews', async (request, reply) => {
    const place = store.get('Place', request.params.place_id);
    if (!place) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    if (missingField(body, ['user_id'])) return badRequest(reply, 'Missing user_id');
    const author = typeof body.user_id === 'string' ? store.get('User', body.user_id) : null;
    if (!author) return notFound(reply);

    if (missingField(body, ['text'])) return badRequest(reply, 'Missing text');

    const review = new Review({ ...body, place_id: place.id, user_id: author.id });
    await persistNew(store, review);
    return reply.code(201).send(review.toDict());
  });

  app.get<{ Params: { review_id: string } }>('/reviews/:review_id', async (request, reply) => {
    const review = store.get('Review', request.params.review_id);
    if (!review) return notFound(reply);
    return review.toDict();
  });

  app.delete<{ Params: { review_id: string } }>('/reviews/:review_id', async (request, reply) => {
    const review = store.get('Review', request.params.review_id);
    if (!review) return notFound(reply);
    return persistDelete(store, review);
  });

  app.put<{ Params: { review_id: string } }>('/reviews/:review_id', async (request, reply) => {
    const review = store.get('Review', request.params.review_id);
    if (!review) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    review.update(without(body, IGNORED_ON_UPDATE));
    await store.save();
    return review.toDict();
  });
}
