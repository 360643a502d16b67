import createDebug from 'debug';
import type { CommandContext, CommandResult, Directive } from '../types/index.js';
import type { CommandData, CommandProcessor } from './commandProcessor.js';

/**
 * Command Router - 에이전트 응답(자유 텍스트)에서 명령과 파라미터를 추출
 *
 * 우선순위 표를 위에서부터 검사해 트리거 문구가 처음 발견되는 행을 사용합니다.
 * 새 명령은 표에 행을 추가해서 연결합니다.
 */

const debug = createDebug('voicedesk:router');

export interface RouteRule {
  command: string;
  triggers: readonly string[];
  /** 트리거 뒤 인자(문장 끝까지)를 명령 파라미터로 변환 */
  extract: (argument: string) => Record<string, unknown>;
}

// 빈 문자열 값은 제외 (스키마 기본값 사용)
function compact(params: Record<string, string | number | undefined>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined && value !== ''));
}

const none = (): Record<string, unknown> => ({});

const SECONDS_PER_UNIT: Record<string, number> = {
  sec: 1,
  second: 1,
  min: 60,
  minute: 60,
  hr: 3600,
  hour: 3600,
};

// "minutes" → "minute"
function unitSeconds(unit: string): number | undefined {
  return SECONDS_PER_UNIT[unit.toLowerCase().replace(/s$/, '')];
}

// 정수 또는 소수 ("1.5"). 앞자리가 숫자나 점이면 매칭하지 않음
const AMOUNT = String.raw`(?<![\d.])(\d+(?:\.\d+)?)`;
const REMINDER_DELAY = new RegExp(String.raw`\s+in\s+${AMOUNT}\s*(minutes?|mins?|hours?|hrs?)$`, 'i');
const TIMER_DURATION = new RegExp(String.raw`${AMOUNT}\s*(seconds?|secs?|minutes?|mins?|hours?|hrs?)\b`, 'i');

function extractReminder(argument: string): Record<string, unknown> {
  const delay = argument.match(REMINDER_DELAY);
  if (!delay || delay.index === undefined) {
    return compact({ reminderText: argument });
  }
  const amount = Number(delay[1]);
  const minutes = /^h/i.test(delay[2]) ? amount * 60 : amount;
  return compact({ reminderText: argument.slice(0, delay.index).trim(), remindInMinutes: minutes });
}

function extractTimer(argument: string): Record<string, unknown> {
  const match = argument.match(TIMER_DURATION);
  if (!match) return {};
  const seconds = unitSeconds(match[2]);
  // 타이머는 초 단위
  return seconds === undefined ? {} : { durationSeconds: Math.round(Number(match[1]) * seconds) };
}

function extractNote(argument: string): Record<string, unknown> {
  return compact({ noteText: argument.replace(/^[\s:,-]+/, '').replace(/^(?:that|saying)\s+/i, '') });
}

function extractTranslation(argument: string): Record<string, unknown> {
  const match = argument.match(/^(.*?)\s+(?:to|into)\s+([A-Za-z]+)$/i);
  if (!match) {
    return compact({ text: stripQuotes(argument) });
  }
  return compact({ text: stripQuotes(match[1]), targetLanguage: match[2] });
}

function stripQuotes(text: string): string {
  return text.trim().replace(/^["']+|["']+$/g, '');
}

export const ROUTE_TABLE: readonly RouteRule[] = [
  { command: 'schedule', triggers: ["today's schedule", 'my schedule today', 'schedule for today'], extract: none },
  { command: 'next_meeting', triggers: ['next meeting'], extract: none },
  { command: 'free_time', triggers: ['free time'], extract: none },
  { command: 'weather', triggers: ['weather in', 'weather for'], extract: argument => compact({ location: argument }) },
  { command: 'weather', triggers: ['weather'], extract: none },
  { command: 'news', triggers: ['news about'], extract: argument => compact({ category: argument }) },
  { command: 'news', triggers: ['news'], extract: none },
  { command: 'reminder', triggers: ['remind me to'], extract: extractReminder },
  { command: 'timer', triggers: ['timer for'], extract: extractTimer },
  { command: 'note', triggers: ['take a note', 'note that'], extract: extractNote },
  { command: 'search', triggers: ['search for'], extract: argument => compact({ query: argument }) },
  { command: 'translate', triggers: ['translate'], extract: extractTranslation },
  { command: 'calculate', triggers: ['calculate'], extract: argument => compact({ expression: argument }) },
  { command: 'fact', triggers: ['fact'], extract: none },
  { command: 'joke', triggers: ['joke'], extract: none },
];

// 마침표는 뒤에 공백이나 끝이 올 때만 문장 끝 (2.5 같은 소수 보존)
const SENTENCE_END = /[.!?](?=\s|$)/;

function argumentAfter(text: string, index: number): string {
  const rest = text.slice(index);
  const end = rest.search(SENTENCE_END);
  return (end === -1 ? rest : rest.slice(0, end)).trim();
}

/**
 * 텍스트에서 지시 추출. 매칭되는 행이 없으면 null
 */
export function matchDirective(text: string, table: readonly RouteRule[] = ROUTE_TABLE): Directive | null {
  const lower = text.toLowerCase();

  for (const rule of table) {
    for (const trigger of rule.triggers) {
      const index = lower.indexOf(trigger);
      if (index === -1) continue;

      const rawParameters = argumentAfter(text, index + trigger.length);
      return {
        name: rule.command,
        trigger,
        rawParameters,
        parameters: rule.extract(rawParameters),
      };
    }
  }

  return null;
}

export class CommandRouter {
  constructor(
    private readonly processor: CommandProcessor,
    private readonly table: readonly RouteRule[] = ROUTE_TABLE
  ) {}

  route(text: string): Directive | null {
    const directive = matchDirective(text, this.table);
    if (directive) {
      debug('"%s" → %s %o', directive.trigger, directive.name, directive.parameters);
    } else {
      debug('No directive in: %s', text);
    }
    return directive;
  }

  /**
   * 지시가 없으면 null, 있으면 CommandProcessor 결과
   */
  async routeAndProcess(text: string, context: CommandContext = {}): Promise<CommandResult<CommandData> | null> {
    const directive = this.route(text);
    if (!directive) return null;
    return this.processor.process(directive.name, directive.parameters, context);
  }
}
