/**
 * Command Registry
 *
 * 음성 명령 정의(이름, 설명, 파라미터 스키마, 소유자 필요 여부, 핸들러)를 관리.
 * 서버 시작 시 한 번 등록하고 freeze() 이후로는 변경 불가.
 */

import type { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { BackgroundTaskScheduler } from '../agents/backgroundTasks.js';
import type { CalendarProvider, NewsProvider, PersistenceStore, WeatherProvider } from '../types/index.js';

// 핸들러가 사용하는 외부 협력자
export interface CommandServices {
  weather: WeatherProvider;
  news: NewsProvider;
  calendar: CalendarProvider;
  store: PersistenceStore;
  tasks: BackgroundTaskScheduler;
  pick: <T>(items: readonly T[]) => T;
  now: () => Date;
  /** 음성 응답의 시각 표기용. 없으면 프로세스 로컬 시간대 */
  timeZone?: string;
}

export interface CommandOutput {
  data: Record<string, unknown>;
  userMessage: string;
}

export interface CommandRuntime<TOwner extends string | null = string | null> {
  ownerId: TOwner;
  services: CommandServices;
}

export type CommandHandler<S extends z.ZodTypeAny, TOwner extends string | null> = (
  params: z.infer<S>,
  runtime: CommandRuntime<TOwner>
) => Promise<CommandOutput>;

interface CommandDefinitionBase<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
}

export type CommandDefinition<S extends z.ZodTypeAny> = CommandDefinitionBase<S> &
  (
    | { requiresOwner: false; handler: CommandHandler<S, string | null> }
    // ownerAction: "I need to know who you are to {ownerAction}."
    | { requiresOwner: true; ownerAction: string; handler: CommandHandler<S, string> }
  );

export interface CommandMetadata {
  name: string;
  description: string;
  requiresOwner: boolean;
}

export interface RegisteredCommand {
  metadata: CommandMetadata;
  /** 파라미터 검증과 소유자 확인 후 핸들러 실행. 실패는 AssistantError로 throw */
  execute(params: unknown, runtime: CommandRuntime): Promise<CommandOutput>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; ');
}

export class CommandRegistry {
  private commands: Map<string, RegisteredCommand> = new Map();
  private frozen = false;

  /**
   * 명령 등록
   */
  register<S extends z.ZodTypeAny>(definition: CommandDefinition<S>): void {
    if (this.frozen) {
      throw new Error(`Command registry is frozen; cannot register '${definition.name}'`);
    }
    if (this.commands.has(definition.name)) {
      throw new Error(`Command '${definition.name}' is already registered`);
    }

    const execute = async (params: unknown, runtime: CommandRuntime): Promise<CommandOutput> => {
      const parsed = definition.schema.safeParse(params ?? {});
      if (!parsed.success) {
        throw new ValidationError(`Invalid parameters for '${definition.name}': ${formatIssues(parsed.error)}`);
      }

      if (definition.requiresOwner) {
        const { ownerId } = runtime;
        if (!ownerId) {
          throw new ValidationError(
            `Command '${definition.name}' requires an owner`,
            `I need to know who you are to ${definition.ownerAction}.`
          );
        }
        return definition.handler(parsed.data, { ownerId, services: runtime.services });
      }
      return definition.handler(parsed.data, runtime);
    };

    this.commands.set(definition.name, {
      metadata: {
        name: definition.name,
        description: definition.description,
        requiresOwner: definition.requiresOwner,
      },
      execute,
    });
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): RegisteredCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  list(): CommandMetadata[] {
    return Array.from(this.commands.values(), command => ({ ...command.metadata }));
  }
}
