import createDebug from 'debug';
import { AssistantError, ExternalProviderError, UnknownCommandError, describeError, isAssistantError } from '../errors.js';
import type { CommandMetadata, CommandRegistry, CommandServices } from '../tools/commandRegistry.js';
import type { AuditLevel, CommandContext, CommandResult } from '../types/index.js';

/**
 * Command Processor
 * 역할: 등록된 명령 실행, 감사 로그 기록, 모든 실패를 CommandResult로 변환
 *
 * process()는 절대 throw하지 않습니다.
 */

const debug = createDebug('voicedesk:commands');

export type CommandData = Record<string, unknown>;

export class CommandProcessor {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly services: CommandServices
  ) {}

  listCommands(): CommandMetadata[] {
    return this.registry.list();
  }

  async process(name: string, params: unknown = {}, context: CommandContext = {}): Promise<CommandResult<CommandData>> {
    const ownerId = context.ownerId ?? null;
    const command = this.registry.get(name);

    if (!command) {
      const error = new UnknownCommandError(name);
      console.warn(`[CommandProcessor] ${error.message}`);
      await this.audit(ownerId, 'WARNING', error.message, { command: name });
      return this.toFailure(error);
    }

    debug("Processing command '%s' for owner %s", name, ownerId ?? 'anonymous');
    await this.audit(ownerId, 'INFO', `Processing voice command: ${name}`, { params });

    try {
      const output = await command.execute(params, { ownerId, services: this.services });
      await this.audit(ownerId, 'INFO', `Command '${name}' completed successfully`, {
        userMessage: output.userMessage,
      });
      return { success: true, data: output.data, userMessage: output.userMessage };
    } catch (error) {
      const failure = this.normalize(error);
      console.error(`[CommandProcessor] Command '${name}' failed for owner ${ownerId ?? 'anonymous'}:`, failure.message);
      await this.audit(ownerId, 'ERROR', `Error processing command '${name}': ${failure.message}`, {
        errorKind: failure.kind,
      });
      return this.toFailure(failure);
    }
  }

  // 예상하지 못한 예외는 외부 의존성 실패로 취급
  private normalize(error: unknown): AssistantError {
    if (isAssistantError(error)) return error;
    return new ExternalProviderError(
      'command',
      describeError(error),
      'Sorry, I encountered an error processing that command.',
      { cause: error }
    );
  }

  private toFailure(error: AssistantError): CommandResult<CommandData> {
    return {
      success: false,
      data: null,
      userMessage: error.userMessage,
      errorKind: error.kind,
      error: error.message,
    };
  }

  private async audit(ownerId: string | null, level: AuditLevel, message: string, extra: Record<string, unknown>) {
    try {
      await this.services.store.appendAudit({ ownerId, level, message, source: 'voice_command_processor', extra });
    } catch (error) {
      console.error('[CommandProcessor] Failed to write audit log:', describeError(error));
    }
  }
}
