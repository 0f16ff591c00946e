import { FastifyInstance } from 'fastify';
import { ObjectStore, State } from 'hearth-storage';
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

interface StateParams {
  state_id: string;
}

export async function registerStateRoutes(app: FastifyInstance, store: ObjectStore): Promise<void> {
  app.get('/states', async () => [...store.all('State').values()].map(state => state.toDict()));

  app.get<{ Params: StateParams }>('/states/:state_id', async (request, reply) => {
    const state = store.get('State', request.params.state_id);
    if (!state) return notFound(reply);
    return state.toDict();
  });

  app.delete<{ Params: StateParams }>('/states/:state_id', async (request, reply) => {
    const state = store.get('State', request.params.state_id);
    if (!state) return notFound(reply);
    return persistDelete(store, state);
  });

  app.post('/states', async (request, reply) => {
    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    const missing = missingField(body, ['name']);
    if (missing) return badRequest(reply, `Missing ${missing}`);

    const state = new State(body);
    await persistNew(store, state);
    return reply.code(201).send(state.toDict());
  });

  app.put<{ Params: StateParams }>('/states/:state_id', async (request, reply) => {
    const state = store.get('State', request.params.state_id);
    if (!state) return notFound(reply);

    const body = readJsonObject(request.body);
    if (!body) return badRequest(reply, 'Not a JSON');

    state.update(without(body, PROTECTED_KEYS));
    await store.save();
    return state.toDict();
  });
}
