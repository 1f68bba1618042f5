import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createServer } from './server.js';

const container = new AppContainer();
const app = createServer(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 ${container.config.app.name} listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`📁 Max history upload: ${container.config.imports.maxFileSizeBytes} bytes`);
});
