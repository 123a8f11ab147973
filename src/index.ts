import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createServer } from './server.js';

const container = new AppContainer();
const app = createServer(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 SMS transaction engine listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`📁 Rule files: ${container.config.rules.directory}`);
  console.log(`🏦 Banks with templates: ${container.fieldExtractor.supportedBanks().join(', ') || 'none'}`);
});
