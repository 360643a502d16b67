/**
 * Built-in Voice Commands
 *
 * schedule, next_meeting, free_time, weather, news, reminder, timer, note,
 * search, translate, calculate, fact, joke
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  describeFreeTime,
  describeNextMeeting,
  describeSchedule,
  getFreeTime,
  getNextMeeting,
  getTodaySchedule,
  serializeEvent,
} from '../agents/agenda.js';
import { ExternalProviderError, ValidationError, describeError } from '../errors.js';
import type { Note, Reminder } from '../types/index.js';
import { calculate, formatNumber } from './calculator.js';
import { CommandRegistry } from './commandRegistry.js';

const MS_PER_MINUTE = 60_000;
const REMINDER_EXPIRY_MS = 24 * 60 * MS_PER_MINUTE;

// ==========================================
// Demo / lookup tables
// ==========================================

const DEMO_HEADLINES: Record<string, string[]> = {
  technology: [
    'AI Assistant Technology Advances with Voice Integration',
    'New Weather API Integration Improves Smart Home Systems',
    'Voice Command Processing Becomes More Accurate',
  ],
  business: [
    'Tech Stocks Rise on AI Innovation News',
    'Smart Assistant Market Expected to Grow 25%',
    'Weather Data Services See Increased Demand',
  ],
  general: [
    'Smart Home Technology Adoption Increases Globally',
    'Voice Assistants Help Improve Daily Productivity',
    'API Integration Simplifies Smart Device Control',
  ],
};

const PHRASEBOOK: Record<string, Record<string, string>> = {
  hello: { Spanish: 'Hola', French: 'Bonjour', German: 'Hallo' },
  goodbye: { Spanish: 'Adiós', French: 'Au revoir', German: 'Auf Wiedersehen' },
  'thank you': { Spanish: 'Gracias', French: 'Merci', German: 'Danke' },
};

export const FACTS: readonly string[] = [
  'The human brain has about 86 billion neurons.',
  'Honey never spoils. Archaeologists have found pots of honey in ancient Egyptian tombs that are over 3,000 years old and still perfectly edible.',
  "A group of flamingos is called a 'flamboyance'.",
  'The shortest war in history was between Britain and Zanzibar on August 27, 1896. Zanzibar surrendered after 38 minutes.',
  'Octopuses have three hearts and blue blood.',
  'The first computer bug was an actual bug - a moth found trapped in a Harvard computer in 1947.',
];

export const JOKES: readonly string[] = [
  "Why don't scientists trust atoms? Because they make up everything!",
  'Why did the scarecrow win an award? He was outstanding in his field!',
  "Why don't eggs tell jokes? They'd crack each other up!",
  'What do you call a fake noodle? An impasta!',
  'Why did the math book look so sad? Because it had too many problems!',
  'What do you call a bear with no teeth? A gummy bear!',
];

// ==========================================
// Formatting helpers
// ==========================================

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/** 125 → "2 minutes and 5 seconds", 45 → "45 seconds" */
export function describeDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;

  if (minutes === 0) return plural(totalSeconds, 'second');
  return seconds > 0 ? `${plural(minutes, 'minute')} and ${plural(seconds, 'second')}` : plural(minutes, 'minute');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

// ==========================================
// Registration
// ==========================================

export function registerBuiltinCommands(registry: CommandRegistry): void {
  // 캘린더 조회
  registry.register({
    name: 'schedule',
    description: "Today's calendar events",
    schema: z.object({}),
    requiresOwner: false,
    handler: async (_params, { services }) => {
      const events = await getTodaySchedule(services.calendar, services.now());
      return {
        data: { events: events.map(serializeEvent) },
        userMessage: events.length
          ? `Here's your schedule for today: ${describeSchedule(events, services.timeZone)}`
          : 'You have no scheduled events for today.',
      };
    },
  });

  registry.register({
    name: 'next_meeting',
    description: 'The next meeting on the calendar',
    schema: z.object({}),
    requiresOwner: false,
    handler: async (_params, { services }) => {
      const meeting = await getNextMeeting(services.calendar, services.now());
      return {
        data: { meeting: meeting ? serializeEvent(meeting) : null },
        userMessage: meeting
          ? `Your next meeting is: ${describeNextMeeting(meeting, services.timeZone)}`
          : "You don't have any upcoming meetings.",
      };
    },
  });

  registry.register({
    name: 'free_time',
    description: 'Free blocks of more than an hour left today',
    schema: z.object({}),
    requiresOwner: false,
    handler: async (_params, { services }) => {
      const now = services.now();
      const slots = await getFreeTime(services.calendar, now, now);
      return {
        data: { slots: slots.map(slot => ({ start: slot.start.toISOString(), end: slot.end.toISOString() })) },
        userMessage: slots.length
          ? `Your free time today: ${describeFreeTime(slots, services.timeZone)}`
          : 'Your schedule is quite busy today.',
      };
    },
  });

  registry.register({
    name: 'weather',
    description: 'Current weather for a location',
    schema: z.object({ location: z.string().trim().min(1).default('New York') }),
    requiresOwner: false,
    handler: async ({ location }, { services }) => {
      if (!services.weather.configured) {
        return {
          data: { location, temperature: '72°F', condition: 'Sunny', demoMode: true },
          userMessage: `The weather in ${location} is currently sunny and 72°F. (Demo mode - configure OPENWEATHER_API_KEY for real data)`,
        };
      }

      const report = await services.weather.getCurrentWeather(location);
      return {
        data: { ...report },
        userMessage:
          `The weather in ${report.location} is ${report.condition} with a temperature of ${report.temperature} ` +
          `(feels like ${report.feelsLike}). Humidity is ${report.humidity} and wind speed is ${report.windSpeed}.`,
      };
    },
  });

  registry.register({
    name: 'news',
    description: 'Latest headlines for a category',
    schema: z.object({ category: z.string().trim().min(1).default('technology') }),
    requiresOwner: false,
    handler: async ({ category }, { services }) => {
      if (!services.news.configured) {
        const headlines = DEMO_HEADLINES[category.toLowerCase()] ?? DEMO_HEADLINES.general;
        return {
          data: { category, headlines, demoMode: true },
          userMessage:
            `Here are the latest ${category} headlines: ${headlines.join(' • ')}` +
            ' (Demo mode - configure NEWS_API_KEY for real news)',
        };
      }

      const result = await services.news.getTopHeadlines(category);
      return {
        data: { ...result },
        userMessage: `Here are the latest ${category} headlines: ${result.headlines.join(' • ')}`,
      };
    },
  });

  registry.register({
    name: 'reminder',
    description: 'Remind the owner about something after a delay',
    schema: z.object({
      reminderText: z.string().trim().min(1),
      remindInMinutes: z.number().positive().default(15),
    }),
    requiresOwner: true,
    ownerAction: 'set a reminder',
    handler: async ({ reminderText, remindInMinutes }, { ownerId, services }) => {
      const now = services.now();
      const remindAt = new Date(now.getTime() + remindInMinutes * MS_PER_MINUTE);
      const reminder: Reminder = {
        id: randomUUID(),
        ownerId,
        text: reminderText,
        remindAt,
        expiresAt: new Date(remindAt.getTime() + REMINDER_EXPIRY_MS),
        triggered: false,
        dismissed: false,
        createdAt: now,
      };

      let saved: Reminder;
      try {
        saved = await services.store.saveReminder(reminder);
      } catch (error) {
        throw new ExternalProviderError(
          'PersistenceStore',
          `Failed to save reminder: ${describeError(error)}`,
          "Sorry, I couldn't set that reminder. Please try again.",
          { cause: error }
        );
      }
      services.tasks.scheduleReminder(saved);

      return {
        data: {
          reminderId: saved.id,
          reminderText,
          remindInMinutes,
          remindAt: remindAt.toISOString(),
        },
        userMessage: `I'll remind you to ${reminderText} in ${remindInMinutes} minutes.`,
      };
    },
  });

  registry.register({
    name: 'timer',
    description: 'Start a countdown timer',
    schema: z.object({
      durationSeconds: z.number().int().positive().default(300),
      timerName: z.string().trim().min(1).default('Timer'),
    }),
    requiresOwner: false,
    handler: async ({ durationSeconds, timerName }, { ownerId, services }) => {
      const timer = services.tasks.startTimer({ name: timerName, durationSeconds, ownerId });
      return {
        data: {
          timerId: timer.id,
          timerName,
          durationSeconds,
          endTime: timer.endTime.toISOString(),
          status: 'started',
        },
        userMessage: `Timer '${timerName}' set for ${describeDuration(durationSeconds)}. I'll let you know when it's done.`,
      };
    },
  });

  registry.register({
    name: 'note',
    description: 'Save a note for the owner',
    schema: z.object({ noteText: z.string().trim().min(1) }),
    requiresOwner: true,
    ownerAction: 'save a note',
    handler: async ({ noteText }, { ownerId, services }) => {
      const note: Note = { id: randomUUID(), ownerId, content: noteText, createdAt: services.now() };

      let saved: Note;
      try {
        saved = await services.store.saveNote(note);
      } catch (error) {
        throw new ExternalProviderError(
          'PersistenceStore',
          `Failed to save note: ${describeError(error)}`,
          "Sorry, I couldn't save that note. Please try again.",
          { cause: error }
        );
      }

      return {
        data: { noteId: saved.id, content: saved.content, createdAt: saved.createdAt.toISOString() },
        userMessage: `Note saved: ${noteText.slice(0, 50)}${noteText.length > 50 ? '...' : ''}`,
      };
    },
  });

  // 검색/번역은 데모 응답
  registry.register({
    name: 'search',
    description: 'Web search (demo results)',
    schema: z.object({ query: z.string().trim().min(1) }),
    requiresOwner: false,
    handler: async ({ query }) => ({
      data: {
        query,
        results: [1, 2, 3].map(n => `Search result ${n} for '${query}'`),
      },
      userMessage: `Here are search results for '${query}': (Demo mode - integrate with search API for real results)`,
    }),
  });

  registry.register({
    name: 'translate',
    description: 'Translate a phrase (demo phrasebook)',
    schema: z.object({
      text: z.string().trim().min(1),
      targetLanguage: z.string().trim().min(1).default('Spanish'),
    }),
    requiresOwner: false,
    handler: async ({ text, targetLanguage }) => {
      const language = capitalize(targetLanguage);
      const translated = PHRASEBOOK[text.toLowerCase()]?.[language] ?? `[${text} in ${language}]`;
      return {
        data: { originalText: text, translatedText: translated, targetLanguage: language },
        userMessage: `'${text}' in ${language} is '${translated}' (Demo mode - integrate with translation API for real translations)`,
      };
    },
  });

  registry.register({
    name: 'calculate',
    description: 'Evaluate an arithmetic expression',
    schema: z.object({ expression: z.string().trim().min(1) }),
    requiresOwner: false,
    handler: async ({ expression }) => {
      try {
        const calculation = calculate(expression);
        return {
          data: { expression: calculation.expression, result: calculation.result },
          userMessage: `${calculation.expression} equals ${formatNumber(calculation.result)}`,
        };
      } catch (error) {
        throw new ValidationError(
          `Calculation error: ${describeError(error)}`,
          `Sorry, I couldn't calculate '${expression}'. Please check the expression and try again.`
        );
      }
    },
  });

  registry.register({
    name: 'fact',
    description: 'A random interesting fact',
    schema: z.object({}),
    requiresOwner: false,
    handler: async (_params, { services }) => {
      const fact = services.pick(FACTS);
      return { data: { fact }, userMessage: `Here's an interesting fact: ${fact}` };
    },
  });

  registry.register({
    name: 'joke',
    description: 'A random joke',
    schema: z.object({}),
    requiresOwner: false,
    handler: async (_params, { services }) => {
      const joke = services.pick(JOKES);
      return { data: { joke }, userMessage: joke };
    },
  });
}

/**
 * 기본 명령이 등록된 레지스트리 (freeze됨)
 */
export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registerBuiltinCommands(registry);
  return registry.freeze();
}

/** Math.random 기반 기본 picker */
export function randomPick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}
