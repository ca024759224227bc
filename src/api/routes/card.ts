import { FastifyInstance, FastifyPluginOptions, FastifyRequest, FastifyReply } from 'fastify';
import { cardIntentSchema } from '@/api/validators/card';
import { buildCardView } from '@/cards/cardView';
import { ICardDisplayStore } from '@/contracts';

export interface CardRoutesOptions extends FastifyPluginOptions {
  store: ICardDisplayStore;
  issuerName: string;
}

export async function cardRoutes(fastify: FastifyInstance, opts: CardRoutesOptions): Promise<void> {
  const { store, issuerName } = opts;

  fastify.get('/v1/card', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ state: store.getState() });
  });

  fastify.get('/v1/card/view', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ view: buildCardView(store.getState(), { issuerName }) });
  });

  fastify.post('/v1/card/intents', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = cardIntentSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid input', details: parsed.error.errors });
    }

    const { intent, wait } = parsed.data;
    store.dispatch(intent);
    if (wait) {
      await store.settled();
    }

    const state = store.getState();
    request.log.info({ message: 'Card intent dispatched', intent, isRevealed: state.isRevealed, isLocked: state.isLocked });
    return reply.send({ intent, state });
  });
}
