import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const app = createApp(container);
const { port, environment } = container.config.app;

app.listen(port, () => {
  console.log(`🚀 Ledger Dashboard API listening on port ${port}`);
  console.log(`📊 Environment: ${environment}`);
  console.log(`🔑 OAuth configured: ${container.hasOAuthClient()}`);
});
