import { getLogger } from '@moneta/logger';

import { DiagnosticChannel } from './diagnostic-channel.js';

const logger = getLogger('money');

export type DeprecatedOperation = 'multiply' | 'divide' | 'percentage';

export const DEPRECATION_MESSAGES: Readonly<Record<DeprecatedOperation, string>> = {
  multiply: 'Multiplying Money instances with floats is deprecated',
  divide: 'Dividing Money instances by floats is deprecated',
  percentage: 'Calculating percentages of Money instances using floats is deprecated',
};

export interface DeprecationDiagnostic {
  type: 'deprecation';
  operation: DeprecatedOperation;
  message: string;
  /** The float operand as the caller passed it */
  operand: number;
}

export type MoneyDiagnostic = DeprecationDiagnostic;

export const moneyDiagnostics = new DiagnosticChannel<MoneyDiagnostic>({
  onError: (error) => {
    logger.error({ error }, 'Money diagnostic handler failed');
  },
});

/**
 * Subscribe to notices raised by Money arithmetic. Returns the unsubscribe function.
 */
export function onMoneyDiagnostic(handler: (diagnostic: MoneyDiagnostic) => void): () => void {
  return moneyDiagnostics.subscribe(handler);
}

export function warnDeprecated(operation: DeprecatedOperation, operand: number): void {
  const message = DEPRECATION_MESSAGES[operation];
  logger.warn({ operation, operand }, message);
  moneyDiagnostics.emit({ type: 'deprecation', operation, message, operand });
}
