// env가 .env를 가장 먼저 로드
import { env } from './config/env.js';
import { createOrchestrator } from './agents/index.js';
import { createApp } from './app.js';
import { describeError } from './errors.js';

const orchestrator = createOrchestrator();
const app = createApp(orchestrator);
const PORT = env.PORT;

// Start server
const server = app.listen(PORT, () => {
  console.log(`
╔═══════════════════════════════════════════════════╗
║                                                   ║
║   🎙  VoiceDesk Backend                            ║
║   Voice assistant, commands & scheduling          ║
║                                                   ║
║   Server running on port ${PORT}                    ║
║   API: http://localhost:${PORT}/api                 ║
║                                                   ║
╚═══════════════════════════════════════════════════╝
  `);
});

// 종료 시 세션과 예약 작업 정리
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, shutting down...`);

  try {
    await orchestrator.shutdown();
  } catch (error) {
    console.error('[Server] Shutdown failed:', describeError(error));
    process.exitCode = 1;
  }
  server.close(() => process.exit());
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

export default app;
