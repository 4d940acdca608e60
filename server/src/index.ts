import { createApp } from './app.js';
import { config } from './config.js';

function start() {
  const app = createApp();
  const server = app.listen(config.port, config.host, () => {
    console.log(`Terabox Share API запущена на ${config.host}:${config.port}`);
  });

  server.on('error', (error) => {
    console.error('Ошибка запуска сервера', error);
    process.exit(1);
  });
}

start();
