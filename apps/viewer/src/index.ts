import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';

dotenv.config();

const config = loadConfig();
const app = await buildApp(config);

app.listen({ port: config.port, host: config.host })
  .then(address => {
    app.log.info({ address, appHost: config.appHost }, 'Viewer listening');
  })
  .catch(err => {
    app.log.error(err, 'Failed to start');
    process.exit(1);
  });
