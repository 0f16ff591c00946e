import { FastifyInstance } from 'fastify';
import { ObjectStore, User } from 'hearth-storage';
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

interface UserParams {
  user_id: string;
}

// The email is fixed once the account exists
const IGNORED_ON_UPDATE = [...PROTECTED_KEYS, 'email'];

export async function registerUserRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  app.get('/users', async () => [...store.all('User').values()].map(user => user.toDict()));

  app.get<{ Params: UserParams }>('/users/:user_id', async (request, reply) => {
    const user = store.get('User', request.params.user_id);
    if (!user) return notFound(reply);
    return user.toDict();
  });

  app.delete<{ Params: UserParams }>('/users/:user_id', async (request, reply) => {
    const user = store.get('User', request.params.user_id);
    if (!user) return notFound(reply);
    return persistDelete(store, user);
  });

  app.post('/users', async (request, reply) => {
    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    const missing = missingField(body, ['email', 'password']);
    if (missing) return badRequest(reply, `Missing ${missing}`);

    const user = new User(body);
    await persistNew(store, user);
    return reply.code(201).send(user.toDict());
  });

  app.put<{ Params: UserParams }>('/users/:user_id', async (request, reply) => {
    const user = store.get('User', request.params.user_id);
    if (!user) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    user.update(without(body, IGNORED_ON_UPDATE));
    await store.save();
    return user.toDict();
  });
}
