import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 Bill Dashboard API listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🧾 Columns: ${Object.values(container.config.bill.columns).join(', ')}`);
});
