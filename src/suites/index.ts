import type { Suite } from '@core/harness/suite.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import { ipEchoSuite } from './api/ipEcho.ts';
import { placeholderSuite } from './api/placeholder.ts';
import { dataProcessingSuite } from './integration/dataProcessing.ts';
import { todoMvcSuite } from './ui/todoMvc.ts';
import { webFormSuite } from './ui/webForm.ts';
import { calculatorSuite } from './unit/calculator.ts';

export {
  calculatorSuite,
  dataProcessingSuite,
  ipEchoSuite,
  placeholderSuite,
  todoMvcSuite,
  webFormSuite,
};

/**
 * Every suite, in run order
 */
export const allSuites: readonly Suite<HarnessFixtures>[] = [
  calculatorSuite,
  dataProcessingSuite,
  placeholderSuite,
  ipEchoSuite,
  todoMvcSuite,
  webFormSuite,
];
