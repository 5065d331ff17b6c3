import { GraphDefinitionError } from '../core/errors';
import { Action } from '../goals/action';
import { reachableGoals, resolveRoute, firstSatisfiedCondition } from '../goals/connection';
import { Field } from '../goals/field';
import { Goal, GoalType } from '../goals/goal';

const makeGoal = (label: string, fields: Field[] = []) =>
  new Goal({ label, goal: `to handle ${label}`, opener: `Opening ${label}` }, fields);

describe('Goal', () => {
  test('should apply defaults from options', () => {
    const goal = makeGoal('order');

    expect(goal.confirm).toBe(true);
    expect(goal.outOfScope).toBeUndefined();
    expect(goal.isRoutingHub).toBe(true);
    expect(goal.action).toBeNull();
  });

  test('should reject duplicate field names', () => {
    const goal = makeGoal('order', [new Field('email', 'customer email')]);

    expect(() => goal.addField(new Field('email', 'another email'))).toThrow(GraphDefinitionError);
  });

  test('should chain connections and drop exact duplicates', () => {
    const order = makeGoal('order');
    const cancel = makeGoal('cancel');

    const returned = order
      .connect(cancel, 'to cancel the order')
      .connect(cancel, 'to cancel the order', { handOver: true })
      .connect(cancel, 'to abort everything');

    expect(returned).toBe(order);
    expect(order.connections).toHaveLength(2);
    expect(order.connections[0].handOver).toBe(false);
    expect(order.connections[1].userGoal).toBe('to abort everything');
  });

  test('should report missing required fields in declaration order', () => {
    const goal = makeGoal('order', [
      new Field('email', 'customer email'),
      new Field('note', 'delivery note (optional)'),
      new Field('product', 'product name'),
    ]);

    expect(goal.hasRequiredFields()).toBe(true);
    expect(goal.missingFields({ email: '  ' }).map((field) => field.name)).toEqual(['email', 'product']);
    expect(goal.requiredFieldsSatisfied({ email: 'a@b.c', product: 'Widget' })).toBe(true);
  });

  test('should leave gated connections out of the prompt context', () => {
    const order = makeGoal('order', [new Field('quantity', 'quantity of product')]);
    const cancel = makeGoal('cancel');
    const verify = makeGoal('verify');

    order
      .connect(cancel, 'to cancel the order')
      .connect(verify, 'to verify a large order', { actionCondition: { name: 'large', test: () => true } });

    const context = order.renderPromptContext();

    expect(context.triggers).toEqual([{ label: 'cancel', userGoal: 'to cancel the order' }]);
    expect(context.fields).toEqual([
      { name: 'quantity', description: 'quantity of product', formatHint: undefined, optional: false },
    ]);
  });

  test('should refuse structural changes once sealed', () => {
    const goal = makeGoal('order');
    goal.seal();

    expect(goal.isSealed).toBe(true);
    expect(() => goal.addField(new Field('email', 'customer email'))).toThrow(GraphDefinitionError);
    expect(() => goal.connect(makeGoal('other'), 'to go elsewhere')).toThrow(
      'Cannot add a connection on goal "order" after a conversation has started'
    );
    expect(() => goal.then(new Action({ handler: (data) => data }))).toThrow(GraphDefinitionError);
  });
});

describe('GoalType', () => {
  test('should instantiate independent goals with the declared fields', () => {
    const OrderGoal = GoalType.define({
      email: { description: 'customer email' },
      note: { description: 'a note', optional: true },
    });

    const first = OrderGoal.create({ label: 'first', goal: 'to order', opener: 'Hi' });
    const second = OrderGoal.create({ label: 'second', goal: 'to order again', opener: 'Hello' });

    expect(OrderGoal.fieldNames).toEqual(['email', 'note']);
    expect(first.fields.map((field) => field.name)).toEqual(['email', 'note']);
    expect(first.getField('note')?.optional).toBe(true);
    expect(first.getField('email')).not.toBe(second.getField('email'));
  });
});

describe('connections', () => {
  test('should resolve routes ignoring case and angle brackets', () => {
    const order = makeGoal('order');
    const cancel = makeGoal('cancel_order');
    order.connect(cancel, 'to cancel');

    expect(resolveRoute(order.connections, '<Cancel_Order>')?.target).toBe(cancel);
    expect(resolveRoute(order.connections, 'refund')).toBeNull();
  });

  test('should keep the first connection for a repeated trigger', () => {
    const order = makeGoal('order');
    const first = makeGoal('first');
    const second = makeGoal('second');
    order.connect(first, 'to stop').connect(second, 'To Stop');

    expect(order.renderPromptContext().triggers).toEqual([{ label: 'first', userGoal: 'to stop' }]);
    expect(resolveRoute(order.connections, 'second')).toBeNull();
  });

  test('should never resolve a gated connection as a route', () => {
    const order = makeGoal('order');
    const verify = makeGoal('verify');
    order.connect(verify, 'to verify', { actionCondition: { name: 'always', test: () => true } });

    expect(resolveRoute(order.connections, 'verify')).toBeNull();
    expect(firstSatisfiedCondition(order.connections, {})?.target).toBe(verify);
  });

  test('should pick the first satisfied condition in declaration order', () => {
    const order = makeGoal('order');
    const small = makeGoal('small');
    const large = makeGoal('large');
    order
      .connect(small, 'small orders', { actionCondition: { name: 'small', test: (data) => data.size === 'S' } })
      .connect(large, 'large orders', { actionCondition: { name: 'large', test: (data) => data.size === 'L' } });

    expect(firstSatisfiedCondition(order.connections, { size: 'L' })?.target).toBe(large);
    expect(firstSatisfiedCondition(order.connections, { size: 'M' })).toBeNull();
  });

  test('should list reachable goals once each, cycles included', () => {
    const a = makeGoal('a');
    const b = makeGoal('b');
    const c = makeGoal('c');
    a.connect(b, 'to b');
    b.connect(a, 'to a').connect(c, 'to c');

    expect(reachableGoals(a).map((goal) => goal.label)).toEqual(['a', 'b', 'c']);
  });
});
