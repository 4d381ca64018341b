import 'dotenv/config';
import express from 'express';
import { PipelineConfig, SetupError, loadConfig } from '../config/settings';
import { RunRegistry, registerRoutes } from './routes';

const startServer = (config: PipelineConfig) => {
  const app = express();
  registerRoutes(app, { config, registry: new RunRegistry() });

  const server = app.listen(config.ui.port, config.ui.bind, () => {
    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : config.ui.port;
    console.log(`[ui] listening at http://${config.ui.bind}:${port}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    console.error(`[ui] failed to start: ${err.code ?? err.message}`);
    process.exitCode = 1;
  });
};

try {
  startServer(loadConfig({ configPath: process.env.PIPELINE_CONFIG, env: process.env }));
} catch (err) {
  if (!(err instanceof SetupError)) throw err;
  console.error(`[ui] setup failed: ${err.message}`);
  process.exitCode = 1;
}
