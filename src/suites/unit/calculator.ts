import { defineSuite } from '@core/harness/suite.ts';
import { Calculator } from '@/examples/Calculator.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import { expect } from 'chai';

const addCases = [
  { a: 0, b: 0, expected: 0 },
  { a: 1, b: 0, expected: 1 },
  { a: 0, b: 1, expected: 1 },
  { a: 100, b: 200, expected: 300 },
  { a: 0.1, b: 0.2, expected: 0.3 },
  { a: -5, b: 5, expected: 0 },
];

const powerCases = [
  { base: 2, exponent: 3, expected: 8 },
  { base: 5, exponent: 2, expected: 25 },
  { base: 10, exponent: 0, expected: 1 },
  { base: 2, exponent: -1, expected: 0.5 },
  { base: 9, exponent: 0.5, expected: 3 },
];

/**
 * Calculator arithmetic
 */
export const calculatorSuite = defineSuite<HarnessFixtures>(
  { name: 'calculator', category: 'unit', file: 'src/suites/unit/calculator.ts' },
  (s) => {
    s.test('add positive numbers', ['calculator'], ({ calculator }) => {
      expect(calculator.add(2, 3)).to.equal(5);
      expect(calculator.add(10, 20)).to.equal(30);
    });

    s.test('add negative numbers', ['calculator'], ({ calculator }) => {
      expect(calculator.add(-5, -3)).to.equal(-8);
      expect(calculator.add(-10, 5)).to.equal(-5);
    });

    s.each(
      addCases,
      ({ a, b }) => `add ${a} + ${b}`,
      ['calculator'],
      ({ calculator }, { a, b, expected }) => {
        expect(calculator.add(a, b)).to.be.closeTo(expected, 1e-9);
      }
    );

    s.test('subtract', ['calculator'], ({ calculator }) => {
      expect(calculator.subtract(10, 5)).to.equal(5);
      expect(calculator.subtract(100, 50)).to.equal(50);
      expect(calculator.subtract(5, 10)).to.equal(-5);
      expect(calculator.subtract(0, 10)).to.equal(-10);
    });

    s.test(
      'multiply',
      ['calculator'],
      ({ calculator }) => {
        expect(calculator.multiply(2, 3)).to.equal(6);
        expect(calculator.multiply(5, 4)).to.equal(20);
      },
      { tags: ['smoke'] }
    );

    s.test('multiply by zero and negatives', ['calculator'], ({ calculator }) => {
      expect(calculator.multiply(100, 0)).to.equal(0);
      expect(calculator.multiply(0, 100)).to.equal(0);
      expect(calculator.multiply(-2, 3)).to.equal(-6);
      expect(calculator.multiply(-2, -3)).to.equal(6);
    });

    s.test('divide', ['calculator'], ({ calculator }) => {
      expect(calculator.divide(10, 2)).to.equal(5);
      expect(calculator.divide(100, 4)).to.equal(25);
      expect(calculator.divide(10, 3)).to.be.closeTo(3.333333, 1e-5);
      expect(calculator.divide(7, 2)).to.equal(3.5);
    });

    s.test('divide by zero', ['calculator'], ({ calculator }) => {
      expect(() => calculator.divide(10, 0)).to.throw(RangeError, 'Division by zero');
    });

    s.each(
      powerCases,
      ({ base, exponent }) => `power ${base} ^ ${exponent}`,
      ['calculator'],
      ({ calculator }, { base, exponent, expected }) => {
        expect(calculator.power(base, exponent)).to.be.closeTo(expected, 1e-9);
      }
    );

    s.test('large numbers', ['calculator'], ({ calculator }) => {
      const large = 10 ** 10;
      expect(calculator.add(large, large)).to.equal(2 * large);
      expect(calculator.multiply(large, 2)).to.equal(2 * large);
    });

    s.test('floats', ['calculator'], ({ calculator }) => {
      expect(calculator.add(0.1, 0.2)).to.be.closeTo(0.3, 1e-9);
      expect(calculator.multiply(0.1, 0.1)).to.be.closeTo(0.01, 1e-9);
    });

    s.test(
      'many operations',
      ['calculator'],
      ({ calculator }) => {
        let result = 0;
        for (let i = 0; i < 1000; i++) {
          result = calculator.add(result, i);
        }
        expect(result).to.equal((999 * 1000) / 2);
      },
      { tags: ['slow'] }
    );

    s.test(
      'square root',
      ['calculator'],
      ({ calculator }) => {
        expect(Reflect.get(calculator, 'sqrt')).to.be.a('function');
      },
      { skip: 'sqrt' in Calculator.prototype ? undefined : 'sqrt is not implemented' }
    );

    s.test(
      'exact float addition',
      ['calculator'],
      ({ calculator }) => {
        expect(calculator.add(0.1, 0.2)).to.equal(0.3);
      },
      { failing: 'binary floating point: 0.1 + 0.2 is 0.30000000000000004' }
    );
  }
);
