import { buildMockIdp } from './app.js';

const { app } = await buildMockIdp({ logLevel: process.env.LOG_LEVEL });

const port = Number(process.env.MOCK_PORT || 4000);
app.listen({ port, host: '0.0.0.0' }).then(addr => {
  app.log.info({ addr }, 'Mock IdP listening');
}).catch(err => {
  app.log.error(err, 'Failed to start');
  process.exit(1);
});
