/**
 * ElevenLabs MCP Client
 *
 * 세션 시작 시 API 키와 에이전트를 확인하고, 응답 문장을 음성으로 합성합니다.
 * 오디오 재생/전송은 이 서비스의 범위 밖이라 합성 결과는 크기만 기록합니다.
 */

import axios, { type AxiosInstance } from 'axios';
import createDebug from 'debug';
import { env } from '../config/env.js';
import { ExternalProviderError, describeError } from '../errors.js';
import type { SpeechOutputSink } from '../types/index.js';

const debug = createDebug('voicedesk:speech');

interface ElevenLabsUser {
  subscription?: {
    tier?: string;
    character_count?: number;
    character_limit?: number;
  };
}

interface ElevenLabsAgent {
  agent_id: string;
  name?: string;
}

export interface ElevenLabsConfig {
  apiKey: string;
  voiceId: string;
  agentId?: string;
  baseUrl?: string;
}

const SPEECH_UNAVAILABLE = "Sorry, I couldn't connect to the voice service.";

// BMP 밖 문자(이모지 등)는 합성에서 제외
function filterUnsupportedCharacters(text: string): string {
  return Array.from(text)
    .filter(char => (char.codePointAt(0) ?? 0) < 0x10000)
    .join('');
}

export class ElevenLabsMCP implements SpeechOutputSink {
  private client: AxiosInstance;
  private voiceId: string;
  private agentId: string;
  private released = false;

  constructor(config: ElevenLabsConfig) {
    this.voiceId = config.voiceId;
    this.agentId = config.agentId ?? '';
    this.client = axios.create({
      baseURL: config.baseUrl ?? 'https://api.elevenlabs.io',
      headers: { 'xi-api-key': config.apiKey },
      timeout: 15_000,
    });
  }

  /**
   * 자격 증명 확인 (GET /v1/user), 에이전트가 설정되어 있으면 에이전트도 확인
   */
  async verify(): Promise<void> {
    try {
      const { data } = await this.client.get<ElevenLabsUser>('/v1/user');
      const subscription = data.subscription;
      if (subscription?.character_limit !== undefined && subscription.character_count !== undefined) {
        debug(
          'Subscription %s, characters remaining %d/%d',
          subscription.tier ?? 'unknown',
          subscription.character_limit - subscription.character_count,
          subscription.character_limit
        );
      }
    } catch (error) {
      throw new ExternalProviderError('ElevenLabs', `Credential check failed: ${describeError(error)}`, SPEECH_UNAVAILABLE, {
        cause: error,
      });
    }

    if (!this.agentId) return;

    try {
      const { data } = await this.client.get<ElevenLabsAgent>(`/v1/convai/agents/${encodeURIComponent(this.agentId)}`);
      debug('Agent verified: %s', data.name ?? data.agent_id);
    } catch (error) {
      throw new ExternalProviderError('ElevenLabs', `Agent ${this.agentId} check failed: ${describeError(error)}`, SPEECH_UNAVAILABLE, {
        cause: error,
      });
    }
  }

  async speak(text: string): Promise<boolean> {
    if (this.released) {
      console.warn('[ElevenLabsMCP] speak() after release ignored');
      return false;
    }

    const filtered = filterUnsupportedCharacters(text);
    try {
      const response = await this.client.post<ArrayBuffer>(
        `/v1/text-to-speech/${encodeURIComponent(this.voiceId)}`,
        { text: filtered, model_id: 'eleven_turbo_v2' },
        { params: { output_format: 'mp3_44100_128' }, responseType: 'arraybuffer' }
      );
      debug('Speech generated (%d bytes) for: %s', response.data.byteLength, filtered.slice(0, 50));
      return true;
    } catch (error) {
      console.error('[ElevenLabsMCP] Speech generation error:', describeError(error));
      return false;
    }
  }

  async release(): Promise<void> {
    this.released = true;
    debug('Speech sink released');
  }
}

/**
 * API 키가 없을 때 사용. 응답 문장을 로그로만 출력합니다.
 */
export class TextOnlySpeechSink implements SpeechOutputSink {
  async verify(): Promise<void> {
    debug('Text-only speech sink in use');
  }

  async speak(text: string): Promise<boolean> {
    console.log(`[Assistant] ${text}`);
    return true;
  }

  async release(): Promise<void> {}
}

/**
 * 세션마다 새 sink를 만듭니다.
 */
export function createSpeechSink(): SpeechOutputSink {
  if (!env.ELEVENLABS_API_KEY) {
    return new TextOnlySpeechSink();
  }
  return new ElevenLabsMCP({
    apiKey: env.ELEVENLABS_API_KEY,
    voiceId: env.ELEVENLABS_VOICE_ID,
    agentId: env.ELEVENLABS_AGENT_ID,
  });
}
