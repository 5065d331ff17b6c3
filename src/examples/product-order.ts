import { randomInt } from 'crypto';
import { ValidationError } from '../core/errors';
import { Action } from '../goals/action';
import type { ActionCondition } from '../goals/connection';
import { invalid, valid, ValidationResult } from '../goals/field';
import { Goal, GoalType } from '../goals/goal';
import type { FieldValues } from '../types';

export const HIGH_QUANTITY_THRESHOLD = 50;

export function quantityValidator(value: unknown): number {
  const quantity = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;

  if (!Number.isInteger(quantity)) {
    throw new ValidationError('Quantity must be a valid number');
  }
  if (quantity <= 0) {
    throw new ValidationError('Quantity cannot be less than one');
  }
  if (quantity > 100) {
    throw new ValidationError('Quantity cannot be greater than 100');
  }
  return quantity;
}

export function verificationCodeValidator(value: unknown): ValidationResult<string> {
  const code = String(value).trim();
  return /^\d{6}$/.test(code) ? valid(code) : invalid('The verification code must be 6 digits');
}

export const isHighQuantity: ActionCondition = {
  name: 'is_high_quantity',
  test: (data) => typeof data.quantity === 'number' && data.quantity >= HIGH_QUANTITY_THRESHOLD,
};

export const ProductOrderGoal = GoalType.define({
  customer_email: { description: 'customer email', formatHint: 'a string' },
  product_name: { description: 'product to be ordered', formatHint: 'a string' },
  quantity: { description: 'quantity of product', formatHint: 'an integer', validator: quantityValidator },
});

export const OrderCancelGoal = GoalType.define({
  reason: { description: 'reason for order cancellation (optional)', formatHint: 'a string' },
});

export const HighValueOrderGoal = GoalType.define({
  verification_code: {
    description: 'verification code',
    formatHint: 'a 6-digit code',
    validator: verificationCodeValidator,
  },
});

export interface ProductOrderGraphOptions {
  rephrase?: boolean;
  nextOrderNumber?: () => string;
  // Delivers a verification code to the customer and returns it
  sendVerificationCode?: (email: string) => string | Promise<string>;
}

export const INCORRECT_CODE_MESSAGE = 'Incorrect verification code. Please try again.';

export const generateVerificationCode = (): string => String(randomInt(0, 1_000_000)).padStart(6, '0');

export interface ProductOrderGraph {
  productOrder: Goal;
  cancelOrder: Goal;
  highValueOrder: Goal;
}

const withOrderNumber =
  (nextOrderNumber: () => string) =>
  (data: FieldValues): FieldValues => ({
    ...data,
    order_number: nextOrderNumber(),
  });

/**
 * Order-taking graph: collect an order, allow cancelling at any point, and
 * divert large orders through a verification step.
 */
export function createProductOrderGraph(options: ProductOrderGraphOptions = {}): ProductOrderGraph {
  const rephrase = options.rephrase ?? true;
  const nextOrderNumber = options.nextOrderNumber ?? (() => 'ORD123456');
  const sendVerificationCode = options.sendVerificationCode ?? generateVerificationCode;

  const productOrder = ProductOrderGoal.create({
    label: 'product_order',
    goal: 'to obtain information on an order to be made',
    opener: 'I see you are trying to order a product, how can I help you?',
    outOfScope: 'For anything else, please contact our sales team at sales@example.com.',
  });

  const cancelOrder = OrderCancelGoal.create({
    label: 'cancel_current_order',
    goal: 'to obtain the reason for the cancellation',
    opener: 'I see you are trying to cancel the current order, how can I help you?',
    outOfScope: 'For anything else, please contact our support team at support@example.com.',
    confirm: false,
  });

  const highValueOrder = HighValueOrderGoal.create({
    label: 'high_value_order',
    goal: 'to verify high-value orders',
    opener:
      "Since you're ordering a large quantity, we need to verify your order. Please enter the verification code we emailed you.",
    outOfScope: 'Please contact support for further assistance.',
    confirm: false,
    hooks: {
      onStart: async ({ data, memory }) => {
        memory.expected_code = await sendVerificationCode(String(data.customer_email));
      },
      onComplete: ({ data, memory }) =>
        data.verification_code === memory.expected_code ? valid(data) : invalid(INCORRECT_CODE_MESSAGE),
    },
  });

  productOrder
    .connect(cancelOrder, 'to cancel the current order', { handOver: true, keepMessages: true })
    .connect(highValueOrder, 'to verify a high-value order', { actionCondition: isHighQuantity, carryData: true })
    .then(
      new Action({
        handler: withOrderNumber(nextOrderNumber),
        responseTemplate: (result) =>
          `Your order has been processed successfully! Your order number is ${result.order_number}.`,
        rephrase,
        end: true,
      })
    );

  cancelOrder
    .connect(productOrder, 'to continue with the order anyway', { handOver: true, keepMessages: true })
    .then(
      new Action({
        handler: withOrderNumber(nextOrderNumber),
        responseTemplate: (result) =>
          `Your order number ${result.order_number} has been cancelled successfully.` +
          (typeof result.reason === 'string' ? ` I understand the reason you provided: ${result.reason}` : ''),
        rephrase,
        end: true,
      })
    );

  highValueOrder
    .connect(cancelOrder, 'to cancel the current order', { handOver: true, keepMessages: true })
    .then(
      new Action({
        handler: withOrderNumber(nextOrderNumber),
        responseTemplate: (result) =>
          `Your high-value order has been verified and processed successfully! Your order number is ${result.order_number}.`,
        rephrase,
        end: true,
      })
    );

  return { productOrder, cancelOrder, highValueOrder };
}
