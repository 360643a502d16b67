/**
 * Command System Entry Point
 *
 * 음성 명령 레지스트리 초기화 및 내보내기
 */

export * from './commandRegistry.js';
export { registerBuiltinCommands, createCommandRegistry, randomPick, describeDuration } from './builtinCommands.js';
export { calculate, parseExpression, evaluate, formatNumber } from './calculator.js';

import { createCommandRegistry } from './builtinCommands.js';
import type { CommandRegistry } from './commandRegistry.js';

/**
 * 명령 시스템 초기화
 * 서버 시작 시 한 번 호출. 반환된 레지스트리는 freeze 상태
 */
export function initializeCommands(): CommandRegistry {
  console.log('[Commands] Initializing command system...');

  const registry = createCommandRegistry();
  const commands = registry.list();

  console.log(`[Commands] Initialized with ${commands.length} commands:`);
  const ownerScoped = commands.filter(c => c.requiresOwner).map(c => c.name);
  console.log(`  - ${commands.map(c => c.name).join(', ')}`);
  console.log(`  Owner required: ${ownerScoped.join(', ') || 'none'}`);

  return registry;
}
