import { ConversationState, validateTransition } from '../chain/state';
import { GoalChainError, InvalidSnapshotError } from '../core/errors';
import { quantityValidator } from '../examples/product-order';
import { Field } from '../goals/field';
import { Goal } from '../goals/goal';
import type { ChainSnapshot } from '../types/graph';

const order = new Goal({ label: 'order', goal: 'to take an order', opener: 'What would you like?' }, [
  new Field('email', 'customer email'),
  new Field('quantity', 'quantity of product', { validator: quantityValidator }),
]);
const cancel = new Goal({ label: 'cancel', goal: 'to cancel an order', opener: 'Why cancel?' }, [
  new Field('reason', 'reason for cancellation (optional)'),
]);

const snapshotOf = (overrides: Partial<ChainSnapshot>): ChainSnapshot => ({
  activeGoal: 'order',
  phase: 'collecting',
  collectedData: {},
  histories: {},
  ...overrides,
});

describe('validateTransition', () => {
  test('should allow moves within an episode', () => {
    expect(validateTransition('awaiting_input', 'collecting')).toBe(true);
    expect(validateTransition('collecting', 'confirming')).toBe(true);
    expect(validateTransition('confirming', 'collecting')).toBe(true);
    expect(validateTransition('confirming', 'done')).toBe(true);
  });

  test('should treat done as terminal', () => {
    expect(validateTransition('done', 'collecting')).toBe(false);
    expect(validateTransition('collecting', 'awaiting_input')).toBe(false);
  });
});

describe('ConversationState', () => {
  test('should reject invalid transitions', () => {
    const state = ConversationState.initial(order);
    state.transition('done');

    expect(() => state.transition('collecting')).toThrow(GoalChainError);
    expect(state.phase).toBe('done');
  });

  test('should isolate clones from the original', () => {
    const state = ConversationState.initial(order);
    state.record({ role: 'user', content: 'hello' });

    const draft = state.clone();
    draft.record({ role: 'assistant', content: 'hi' });
    draft.collectedData.email = 'a@b.c';
    draft.transition('collecting');

    expect(state.history()).toEqual([{ role: 'user', content: 'hello' }]);
    expect(state.collectedData).toEqual({});
    expect(state.phase).toBe('awaiting_input');
  });

  test('should copy history on switch when keepMessages is set', () => {
    const state = ConversationState.initial(order);
    state.record({ role: 'user', content: 'cancel it' });
    state.collectedData.email = 'a@b.c';

    state.switchGoal(cancel, { keepMessages: true, carryData: false });
    state.record({ role: 'assistant', content: 'Why cancel?' });

    expect(state.activeGoal).toBe(cancel);
    expect(state.phase).toBe('awaiting_input');
    expect(state.collectedData).toEqual({});
    expect(state.history('order')).toEqual([{ role: 'user', content: 'cancel it' }]);
    expect(state.history('cancel')).toEqual([
      { role: 'user', content: 'cancel it' },
      { role: 'assistant', content: 'Why cancel?' },
    ]);
  });

  test('should start the target empty without keepMessages and carry data on request', () => {
    const state = ConversationState.initial(order);
    state.record({ role: 'user', content: 'fifty please' });
    state.collectedData.quantity = 50;

    state.switchGoal(cancel, { keepMessages: false, carryData: true });

    expect(state.history()).toEqual([]);
    expect(state.collectedData).toEqual({ quantity: 50 });
  });

  test('should start a new episode keeping history', () => {
    const state = ConversationState.initial(order);
    state.record({ role: 'user', content: 'hello' });
    state.collectedData.email = 'a@b.c';
    state.transition('done');

    state.startEpisode();

    expect(state.phase).toBe('awaiting_input');
    expect(state.collectedData).toEqual({});
    expect(state.history()).toHaveLength(1);
  });

  test('should round-trip through a snapshot', () => {
    const state = ConversationState.initial(order);
    state.record({ role: 'user', content: 'hello' });
    state.collectedData.email = 'a@b.c';
    state.transition('collecting');

    const restored = ConversationState.fromSnapshot(state.snapshot(), [order, cancel]);

    expect(restored.snapshot()).toEqual({
      activeGoal: 'order',
      phase: 'collecting',
      collectedData: { email: 'a@b.c' },
      histories: { order: [{ role: 'user', content: 'hello' }] },
    });
  });

  test('should reject snapshots naming an unknown goal', () => {
    expect(() => ConversationState.fromSnapshot(snapshotOf({ activeGoal: 'refund' }), [order])).toThrow(
      InvalidSnapshotError
    );
  });

  test('should run restored values through their validators', () => {
    const restored = ConversationState.fromSnapshot(snapshotOf({ collectedData: { quantity: '3' } }), [order]);

    expect(restored.collectedData).toEqual({ quantity: 3 });
  });

  test('should reject restored values the validator refuses', () => {
    const snapshot = snapshotOf({ collectedData: { email: 'a@b.c', quantity: 500 } });

    expect(() => ConversationState.fromSnapshot(snapshot, [order])).toThrow(
      'Snapshot value for "quantity" is invalid: Quantity cannot be greater than 100'
    );
  });

  test('should reject fields no goal declares', () => {
    const snapshot = snapshotOf({ collectedData: { colour: 'red' } });

    expect(() => ConversationState.fromSnapshot(snapshot, [order, cancel])).toThrow(
      'Snapshot holds undeclared field "colour"'
    );
  });

  test('should accept data carried over from another goal', () => {
    const snapshot = snapshotOf({ activeGoal: 'cancel', collectedData: { email: 'a@b.c', reason: 'late' } });

    const restored = ConversationState.fromSnapshot(snapshot, [order, cancel]);

    expect(restored.activeGoal).toBe(cancel);
    expect(restored.collectedData).toEqual({ email: 'a@b.c', reason: 'late' });
  });

  test('should reject a confirming phase with required fields missing', () => {
    const snapshot = snapshotOf({ phase: 'confirming', collectedData: { quantity: 5 } });

    expect(() => ConversationState.fromSnapshot(snapshot, [order])).toThrow(InvalidSnapshotError);
  });

  test('should keep hook memory through a snapshot', () => {
    const state = ConversationState.initial(order);
    state.switchGoal(cancel, { keepMessages: false, carryData: false });
    state.memory().ticket = 'T-1';

    const restored = ConversationState.fromSnapshot(state.snapshot(), [order, cancel]);

    expect(restored.snapshot().memory).toEqual({ cancel: { ticket: 'T-1' } });
    expect(restored.memory()).toEqual({ ticket: 'T-1' });
  });
});
