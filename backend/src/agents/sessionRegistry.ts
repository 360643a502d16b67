import type { Session, SessionState } from '../types/index.js';

/**
 * Session Registry
 *
 * ownerId당 비종료 세션은 하나. 모든 변경은 동기 메서드라서 (읽기와 쓰기 사이에 await 없음)
 * 이벤트 루프 위에서 create-if-absent와 compare-and-swap이 원자적으로 동작한다.
 * 조회 결과는 항상 복사본.
 */

export const TERMINAL_STATES: readonly SessionState[] = ['Stopped', 'Failed'];

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export class SessionRegistry {
  private current = new Map<string, Session>();
  // 종료된 세션의 마지막 상태 (상태 조회용)
  private lastKnown = new Map<string, Session>();

  /**
   * 비종료 세션이 없을 때만 생성. 이미 있으면 null
   */
  createIfAbsent(ownerId: string, create: () => Session): Session | null {
    if (this.current.has(ownerId)) return null;

    const session = create();
    this.current.set(ownerId, session);
    return { ...session };
  }

  get(ownerId: string): Session | null {
    const session = this.current.get(ownerId);
    return session ? { ...session } : null;
  }

  /** 현재 세션이든 종료된 세션이든 id가 일치하는 것 */
  find(ownerId: string, sessionId: string): Session | null {
    const session = this.current.get(ownerId) ?? this.lastKnown.get(ownerId);
    return session && session.id === sessionId ? { ...session } : null;
  }

  /** 현재 세션, 없으면 마지막으로 종료된 세션 */
  latest(ownerId: string): Session | null {
    const session = this.current.get(ownerId) ?? this.lastKnown.get(ownerId);
    return session ? { ...session } : null;
  }

  /**
   * 상태가 expected 중 하나일 때만 next로 전이. 종료 상태로 가면 registry에서 빠진다.
   */
  compareAndSwap(
    ownerId: string,
    sessionId: string,
    expected: SessionState | readonly SessionState[],
    next: SessionState,
    patch: Partial<Pick<Session, 'lastActivityAt' | 'stoppedAt' | 'stopReason'>> = {}
  ): Session | null {
    const session = this.current.get(ownerId);
    if (!session || session.id !== sessionId) return null;

    const allowed: readonly SessionState[] = typeof expected === 'string' ? [expected] : expected;
    if (!allowed.includes(session.state)) return null;

    Object.assign(session, patch, { state: next });

    if (isTerminal(next)) {
      this.current.delete(ownerId);
      this.lastKnown.set(ownerId, session);
    }
    return { ...session };
  }

  /** 재시도 횟수 증가 (Starting 상태에서만) */
  incrementRetry(ownerId: string, sessionId: string): number | null {
    const session = this.current.get(ownerId);
    if (!session || session.id !== sessionId || session.state !== 'Starting') return null;
    session.retryCount += 1;
    return session.retryCount;
  }

  /** 활동 시각 기록 (Active 상태에서만) */
  touch(ownerId: string, sessionId: string, at: Date): boolean {
    const session = this.current.get(ownerId);
    if (!session || session.id !== sessionId || session.state !== 'Active') return false;
    session.lastActivityAt = at;
    return true;
  }

  owners(): string[] {
    return Array.from(this.current.keys());
  }

  size(): number {
    return this.current.size;
  }
}
