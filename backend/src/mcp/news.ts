/**
 * News MCP Client
 *
 * NewsAPI를 통해 카테고리별 최신 헤드라인을 조회합니다.
 */

import axios from 'axios';
import createDebug from 'debug';
import { env } from '../config/env.js';
import { ExternalProviderError, describeError } from '../errors.js';
import type { NewsHeadlines, NewsProvider } from '../types/index.js';

const debug = createDebug('voicedesk:news');

// NewsAPI 응답 타입
interface NewsAPIResponse {
  status: string;
  totalResults: number;
  articles: Array<{
    source: { id: string | null; name: string };
    title: string | null;
    url: string;
    publishedAt: string;
  }>;
  code?: string;
  message?: string;
}

export class NewsMCP implements NewsProvider {
  private apiKey: string;
  private baseUrl = 'https://newsapi.org/v2';
  private defaultCountry = 'us';

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? env.NEWS_API_KEY;

    if (!this.apiKey) {
      console.warn('[NewsMCP] API key not set. News commands will return demo headlines.');
    }
  }

  get configured(): boolean {
    return this.apiKey !== '';
  }

  /**
   * 최신 헤드라인 조회
   */
  async getTopHeadlines(category: string, pageSize = 5): Promise<NewsHeadlines> {
    const userMessage = `Sorry, I couldn't get the latest ${category} news right now. Please try again later.`;

    if (!this.configured) {
      throw new ExternalProviderError('NewsAPI', 'NEWS_API_KEY not set', userMessage);
    }

    debug('Fetching %s headlines', category);

    let data: NewsAPIResponse;
    try {
      const response = await axios.get<NewsAPIResponse>(`${this.baseUrl}/top-headlines`, {
        params: {
          apiKey: this.apiKey,
          category: category.toLowerCase(),
          country: this.defaultCountry,
          pageSize,
        },
        timeout: 10_000,
      });
      data = response.data;
    } catch (error) {
      console.error('[NewsMCP] getTopHeadlines error:', describeError(error));
      throw new ExternalProviderError('NewsAPI', `Failed to fetch news: ${describeError(error)}`, userMessage, {
        cause: error,
      });
    }

    if (data.status !== 'ok') {
      console.error('[NewsMCP] API error:', data.message);
      throw new ExternalProviderError('NewsAPI', `News API error: ${data.message ?? 'Unknown error'}`, userMessage);
    }

    return {
      category,
      headlines: data.articles.map(article => article.title).filter((title): title is string => Boolean(title)),
      totalResults: data.totalResults,
    };
  }
}

// 싱글톤 인스턴스
let instance: NewsMCP | null = null;

export function getNewsMCP(): NewsMCP {
  if (!instance) {
    instance = new NewsMCP();
  }
  return instance;
}
