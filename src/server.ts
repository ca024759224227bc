import { buildApp } from '@/app';
import { CardDisplayStore } from '@/cards/cardDisplayStore';
import { getCardDetailsProvider } from '@/cards/providerFactory';
import { env } from '@/config/env';

async function start() {
  const store = new CardDisplayStore(getCardDetailsProvider());
  const app = buildApp({ store });

  app.addHook('onClose', async () => {
    store.dispose();
  });

  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
    console.log(JSON.stringify({ level: 'info', message: `Server running on port ${env.PORT}` }));
  } catch (err) {
    console.error(JSON.stringify({ level: 'error', message: 'Server failed to start', error: String(err) }));
    process.exit(1);
  }
}

start().catch((err) => {
  console.error(JSON.stringify({ level: 'error', message: 'Server crashed', error: String(err) }));
  process.exit(1);
});
