import { FastifyInstance } from 'fastify';
import { ObjectStore } from 'hearth-storage';

/**
 * GET /status, GET /stats
 */
export async function registerIndexRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  app.get('/status', async () => ({ status: 'OK' }));

  app.get('/stats', async () => ({
    amenities: store.count('Amenity'),
    cities: store.count('City'),
    places: store.count('Place'),
    reviews: store.count('Review'),
    states: store.count('State'),
    users: store.count('User')
  }));
}
