import type { AttributeTest, OperatorTest, VariableRef } from '../types/condition.js';

/** Type guard: `{ var: "name" }` */
export function isVariableRef(value: unknown): value is VariableRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'var' in value &&
    typeof value.var === 'string'
  );
}

/** Type guard: `{ operator, value?, bind? }` */
export function isOperatorTest(test: AttributeTest): test is OperatorTest {
  return typeof test === 'object' && test !== null && !Array.isArray(test) && 'operator' in test;
}
