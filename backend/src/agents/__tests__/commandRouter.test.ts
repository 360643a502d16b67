import { describe, it, expect, afterEach } from 'vitest';
import { CommandProcessor } from '../commandProcessor.js';
import { CommandRouter, ROUTE_TABLE, matchDirective } from '../commandRouter.js';
import { createCommandRegistry } from '../../tools/builtinCommands.js';
import { createTestServices, type TestServices } from './fakes.js';

describe('matchDirective', () => {
  it('extracts a location after "weather in" up to the end of the sentence', () => {
    expect(matchDirective('Let me check the weather in Paris. One moment.')).toEqual({
      name: 'weather',
      trigger: 'weather in',
      rawParameters: 'Paris',
      parameters: { location: 'Paris' },
    });
  });

  it('matches triggers case-insensitively but keeps the original argument text', () => {
    expect(matchDirective('WEATHER FOR San Francisco')?.parameters).toEqual({ location: 'San Francisco' });
  });

  it('falls back to the bare trigger with no parameters', () => {
    expect(matchDirective("Here's the weather!")).toEqual({
      name: 'weather',
      trigger: 'weather',
      rawParameters: '',
      parameters: {},
    });
  });

  it('uses the first matching row of the table', () => {
    expect(matchDirective('Here is the news about sports and the weather')?.name).toBe('weather');
  });

  it('reads news categories', () => {
    expect(matchDirective('Here is the news about Business.')?.parameters).toEqual({ category: 'Business' });
  });

  it('parses reminder text and delay', () => {
    expect(matchDirective('Okay, remind me to call mom in 2 hours.')?.parameters).toEqual({
      reminderText: 'call mom',
      remindInMinutes: 120,
    });
    expect(matchDirective('remind me to stretch in 15 minutes')?.parameters).toEqual({
      reminderText: 'stretch',
      remindInMinutes: 15,
    });
    expect(matchDirective('remind me to stretch')?.parameters).toEqual({ reminderText: 'stretch' });
  });

  it('converts timer durations to seconds', () => {
    expect(matchDirective('Setting a timer for 5 minutes now.')?.parameters).toEqual({ durationSeconds: 300 });
    expect(matchDirective('timer for 90 seconds')?.parameters).toEqual({ durationSeconds: 90 });
    expect(matchDirective('timer for 2 hours')?.parameters).toEqual({ durationSeconds: 7200 });
    expect(matchDirective('timer for a while')?.parameters).toEqual({});
  });

  it('reads decimal durations', () => {
    expect(matchDirective('Set a timer for 1.5 minutes.')?.parameters).toEqual({ durationSeconds: 90 });
    expect(matchDirective('timer for 0.25 hours')?.parameters).toEqual({ durationSeconds: 900 });
    expect(matchDirective('remind me to stretch in 1.5 hours.')?.parameters).toEqual({
      reminderText: 'stretch',
      remindInMinutes: 90,
    });
  });

  it('strips lead-in punctuation from notes', () => {
    expect(matchDirective('Sure, I will take a note: buy milk.')?.parameters).toEqual({ noteText: 'buy milk' });
    expect(matchDirective('note that the meeting moved')?.parameters).toEqual({ noteText: 'the meeting moved' });
  });

  it('splits translation text from the target language', () => {
    expect(matchDirective("translate 'hello' to French")?.parameters).toEqual({
      text: 'hello',
      targetLanguage: 'French',
    });
    expect(matchDirective('translate thank you')?.parameters).toEqual({ text: 'thank you' });
  });

  it('keeps decimal points inside a calculation', () => {
    expect(matchDirective('calculate 2.5 * 4.')?.parameters).toEqual({ expression: '2.5 * 4' });
  });

  it('routes calendar questions ahead of everything else', () => {
    expect(matchDirective("Here's today's schedule and the weather.")?.name).toBe('schedule');
    expect(matchDirective('What is on my schedule today?')?.name).toBe('schedule');
    expect(matchDirective('When is my next meeting?')).toEqual({
      name: 'next_meeting',
      trigger: 'next meeting',
      rawParameters: '',
      parameters: {},
    });
    expect(matchDirective('Do I have any free time before the news?')?.name).toBe('free_time');
  });

  it('routes facts and jokes', () => {
    expect(matchDirective('Tell me a joke')?.name).toBe('joke');
    expect(matchDirective('Here is a fun fact for you')?.name).toBe('fact');
  });

  it('returns null when nothing matches', () => {
    expect(matchDirective('Hello there, how are you?')).toBeNull();
  });

  it('lists rows in priority order', () => {
    expect(ROUTE_TABLE.map(rule => rule.command)).toEqual([
      'schedule',
      'next_meeting',
      'free_time',
      'weather',
      'weather',
      'news',
      'news',
      'reminder',
      'timer',
      'note',
      'search',
      'translate',
      'calculate',
      'fact',
      'joke',
    ]);
  });

  it('accepts a custom table', () => {
    const table = [{ command: 'joke', triggers: ['cheer me up'], extract: () => ({}) }];
    expect(matchDirective('please cheer me up', table)?.name).toBe('joke');
    expect(matchDirective('weather in Paris', table)).toBeNull();
  });
});

describe('CommandRouter', () => {
  let services: TestServices;

  afterEach(async () => {
    await services.tasks.shutdown();
  });

  function makeRouter(): CommandRouter {
    services = createTestServices();
    return new CommandRouter(new CommandProcessor(createCommandRegistry(), services));
  }

  it('returns null without running anything when no directive matches', async () => {
    const router = makeRouter();

    expect(await router.routeAndProcess('Nice to meet you.')).toBeNull();
    expect(services.store.listAudit()).toEqual([]);
  });

  it('processes the routed command', async () => {
    const router = makeRouter();

    const result = await router.routeAndProcess('Let me calculate 6 * 7. Just a second.');

    expect(result).toEqual({
      success: true,
      data: { expression: '6 * 7', result: 42 },
      userMessage: '6 * 7 equals 42',
    });
  });
});
