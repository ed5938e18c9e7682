import 'dotenv/config';
import express from 'express';
import { feishuRouter } from './routes/feishu.js';
import { startWSClient, stopWSClient } from './feishu/ws-client.js';
import { isBackendHealthy } from './backend/health.js';
import { getRelay } from './services/relay.js';
import { log } from './utils/log.js';

const relay = getRelay();
const { config } = relay;

const app = express();
app.use(express.json());

app.get('/health', async (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    backend: { healthy: await isBackendHealthy(config.endpoint) },
  });
});

app.use('/api/feishu', feishuRouter);

const server = app.listen(config.port, async () => {
  console.log(`🚀 OpenCode chat relay running on port ${config.port}`);
  console.log(`   ℹ️  Backend: ${config.endpoint.baseUrl} (${config.deliveryMode} delivery)`);

  // 启动失败不致命：用户可以稍后发 /opencode 重试
  const started = await relay.orchestrator.startBackend();
  log(started.ok ? 'info' : 'warn', 'backend_startup', { ok: started.ok, message: started.message });

  if (config.useLongConnection) {
    console.log('📡 Mode: WebSocket Long Connection');
    try {
      await startWSClient();
      console.log('   ✅ WebSocket client started successfully');
    } catch (error) {
      console.error('   ❌ Failed to start WebSocket client:', error);
      process.exit(1);
    }
  } else {
    console.log('🌐 Mode: HTTP Webhook');
    console.log('   ℹ️  Configure webhook URL in Feishu console:');
    console.log('   ℹ️  http://your-domain/api/feishu/webhook');
  }
});

// Graceful shutdown：opencode 进程独立运行，不随 relay 退出
async function shutdown(signal: string): Promise<void> {
  console.log(`\n🛑 ${signal} received, shutting down gracefully...`);

  if (config.useLongConnection) {
    await stopWSClient();
  }

  server.close(() => {
    console.log('✅ Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(error => log('error', 'shutdown_failed', { error: String(error) }));
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(error => log('error', 'shutdown_failed', { error: String(error) }));
});
