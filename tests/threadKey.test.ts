import { isThreadKey, resolveThreadKey, threadKey } from '../src/lib/threadKey';

const ALICE = '11111111-aaaa-4bbb-8ccc-000000000001';
const BOB = '22222222-aaaa-4bbb-8ccc-000000000002';
const CARA = '33333333-aaaa-4bbb-8ccc-000000000003';

describe('threadKey', () => {
  test('hashes the sorted, dash-joined ids as lowercase hex', () => {
    expect(threadKey([BOB, ALICE])).toBe('b803475f43e1280f965f7f1c78539d19b63f6be388ae7ec92d070d691a213cd5');
  });

  test('is the same for every ordering and for whoever computes it', () => {
    const fromAlice = threadKey([ALICE, BOB, CARA]);
    const fromBob = threadKey([BOB, CARA, ALICE]);
    const fromCara = threadKey([CARA, ALICE, BOB]);
    expect(fromBob).toBe(fromAlice);
    expect(fromCara).toBe(fromAlice);
  });

  test('works for a conversation with only the local participant', () => {
    expect(threadKey(['u1'])).toBe('bb82030dbc2bcaba32a90bf2e207a84a856fc5f033b77c480836ab6f77f40f19');
  });

  test('does not contain the participant ids', () => {
    const key = threadKey([ALICE, BOB]);
    expect(key).toHaveLength(64);
    expect(key.includes(ALICE)).toBe(false);
  });

  test('gives distinct keys for distinct participant sets', () => {
    const keys = new Set<string>();
    for (let i = 0; i < 200; i++) {
      keys.add(threadKey([`user-${i}`]));
      keys.add(threadKey([`user-${i}`, `user-${i + 1}`]));
    }
    expect(keys.size).toBe(400);
  });

  test('treats a repeated id as one participant', () => {
    expect(threadKey([ALICE, BOB, ALICE])).toBe(threadKey([ALICE, BOB]));
  });
});

describe('resolveThreadKey', () => {
  const key = threadKey([ALICE, BOB]);

  test('accepts a precomputed key', () => {
    expect(resolveThreadKey({ threadKey: key })).toBe(key);
  });

  test('rejects a key that is not 64 lowercase hex chars', () => {
    expect(resolveThreadKey({ threadKey: key.toUpperCase() })).toBeNull();
    expect(resolveThreadKey({ threadKey: 'abc' })).toBeNull();
  });

  test('derives the key from participant ids', () => {
    expect(resolveThreadKey({ participantIds: [BOB, ALICE] })).toBe(key);
  });

  test('derives the key from local and remote ids', () => {
    expect(resolveThreadKey({ localParticipantId: BOB, remoteParticipantIds: [ALICE] })).toBe(key);
    expect(resolveThreadKey({ localParticipantId: 'u1' })).toBe(threadKey(['u1']));
  });

  test('returns null for unusable input', () => {
    expect(resolveThreadKey(null)).toBeNull();
    expect(resolveThreadKey({})).toBeNull();
    expect(resolveThreadKey({ participantIds: [] })).toBeNull();
    expect(resolveThreadKey({ participantIds: [ALICE, 42] })).toBeNull();
    expect(resolveThreadKey({ localParticipantId: ALICE, remoteParticipantIds: 'nope' })).toBeNull();
  });

  test('isThreadKey checks the shape only', () => {
    expect(isThreadKey(key)).toBe(true);
    expect(isThreadKey(42)).toBe(false);
  });
});
