import {
  clockTime,
  MAX_TRANSCRIPT,
  SESSION_TTL_MS,
  WebSessionStore,
} from './web-session.store';

const entry = (text: string, isUser = true) => ({ text, isUser, timestamp: '09:00' });

describe('WebSessionStore', () => {
  let store: WebSessionStore;

  beforeEach(() => {
    store = new WebSessionStore();
  });

  it('keeps one transcript per destination', () => {
    store.append('s1', 1, entry('Hi Paris'), 0);
    store.append('s1', 2, entry('Hi Rome'), 0);

    expect(store.transcript('s1', 1, 0)).toEqual([entry('Hi Paris')]);
    expect(store.transcript('s1', 2, 0)).toEqual([entry('Hi Rome')]);
    expect(store.transcript('s2', 1, 0)).toEqual([]);
  });

  it('keeps only the most recent messages', () => {
    for (let i = 0; i < MAX_TRANSCRIPT + 5; i++) store.append('s1', 1, entry(`m${i}`), 0);

    const transcript = store.transcript('s1', 1, 0);
    expect(transcript).toHaveLength(50);
    expect(transcript[0].text).toBe('m5');
  });

  it('clears one destination without touching the others', () => {
    store.append('s1', 1, entry('a'), 0);
    store.append('s1', 2, entry('b'), 0);

    store.clear('s1', 1, 0);

    expect(store.transcript('s1', 1, 0)).toEqual([]);
    expect(store.transcript('s1', 2, 0)).toHaveLength(1);
  });

  it('hands out flash messages once', () => {
    store.flash('s1', { kind: 'success', text: 'Saved' }, 0);

    expect(store.takeFlashes('s1', 0)).toEqual([{ kind: 'success', text: 'Saved' }]);
    expect(store.takeFlashes('s1', 0)).toEqual([]);
  });

  it('expires idle sessions', () => {
    store.append('s1', 1, entry('a'), 0);
    store.append('s2', 1, entry('b'), SESSION_TTL_MS);

    expect(store.transcript('s1', 1, SESSION_TTL_MS + 1)).toEqual([]);
    expect(store.sweep(2 * SESSION_TTL_MS + 2)).toBe(2);
    expect(store.size).toBe(0);
  });

  it('formats timestamps as hours and minutes', () => {
    expect(clockTime(new Date(2024, 0, 1, 9, 5))).toBe('09:05');
  });
});
