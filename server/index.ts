import fs from 'fs';
import { createApp } from './app.js';
import { JsonFileConfigStore, loadServerConfig } from './config.js';
import { DeepLClient } from './translator.js';

const settings = loadServerConfig();

if (!fs.existsSync(settings.dataDir)) {
  fs.mkdirSync(settings.dataDir, { recursive: true });
}

const app = createApp({
  config: new JsonFileConfigStore(settings.configPath),
  client: new DeepLClient({
    baseUrl: settings.deeplApiUrl,
    timeoutMs: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries
  }),
  dataDir: settings.dataDir,
  charLimit: settings.charLimit
});

app.listen(settings.port, () => {
  console.log(`Server running on http://localhost:${settings.port}`);
});
