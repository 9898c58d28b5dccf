import { access, writeFile } from 'node:fs/promises';
import { defineSuite } from '@core/harness/suite.ts';
import { DataFormatError } from '@core/errors.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import type { FakeDataGenerator } from '@services/fake-data/FakeDataGenerator.ts';
import { sequence, take } from '@services/fake-data/FakeDataGenerator.ts';
import { expect } from 'chai';
import { z } from 'zod';

interface ProductRecord {
  [key: string]: unknown;
  id: number;
  name: string;
  price: number;
  quantity: number;
  category: 'electronics' | 'clothing' | 'food';
}

interface PersonRecord {
  [key: string]: unknown;
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  city: string;
}

function products(fake: FakeDataGenerator, count = 10): ProductRecord[] {
  return take(
    sequence((index) => ({
      id: index + 1,
      name: fake.faker.company.catchPhrase(),
      price: fake.int(0, 999),
      quantity: fake.int(1, 100),
      category: fake.faker.helpers.arrayElement(['electronics', 'clothing', 'food'] as const),
    })),
    count
  );
}

function people(fake: FakeDataGenerator, count = 5): PersonRecord[] {
  return take(
    sequence((index) => ({
      id: index + 1,
      firstName: fake.faker.person.firstName(),
      lastName: fake.faker.person.lastName(),
      email: fake.faker.internet.email(),
      city: fake.faker.location.city(),
    })),
    count
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const recordsEnvelope = (key: string) => z.object({ [key]: z.array(z.record(z.unknown())) });

/**
 * DataProcessor persistence and transforms on a temporary directory
 */
export const dataProcessingSuite = defineSuite<HarnessFixtures>(
  {
    name: 'data processing',
    category: 'integration',
    file: 'src/suites/integration/dataProcessing.ts',
  },
  (s) => {
    s.test(
      'save and load json',
      ['dataProcessor', 'fakeData'],
      async ({ dataProcessor, fakeData }) => {
        const items = products(fakeData);

        const path = await dataProcessor.saveJson({ products: items }, 'products.json');
        expect(await exists(path)).to.equal(true);

        const loaded = await dataProcessor.loadJsonAs('products.json', recordsEnvelope('products'));
        expect(loaded.products).to.deep.equal(items);
      }
    );

    s.test(
      'save and load csv',
      ['dataProcessor', 'fakeData'],
      async ({ dataProcessor, fakeData }) => {
        const users = people(fakeData);

        const path = await dataProcessor.saveCsv(users, 'users.csv');
        expect(await exists(path)).to.equal(true);

        const loaded = await dataProcessor.loadCsv('users.csv');
        expect(loaded).to.have.lengthOf(users.length);
        // every CSV value comes back as a string
        expect(loaded[0]).to.include({
          id: '1',
          firstName: users[0]?.firstName,
          email: users[0]?.email,
        });
      }
    );

    s.test('transform adds total', ['dataProcessor', 'fakeData'], ({ dataProcessor, fakeData }) => {
      const items = products(fakeData);

      for (const product of dataProcessor.transform(items)) {
        expect(product.total).to.equal(product.price * product.quantity);
      }
    });

    s.test(
      'transform adds full name',
      ['dataProcessor', 'fakeData'],
      ({ dataProcessor, fakeData }) => {
        const users = people(fakeData);
        const transformed = dataProcessor.transform(users);

        for (const user of transformed) {
          expect(user.fullName).to.equal(`${user.firstName} ${user.lastName}`);
        }
        expect(users[0]).to.not.have.property('fullName');
      }
    );

    s.test('filter by category', ['dataProcessor', 'fakeData'], ({ dataProcessor, fakeData }) => {
      const electronics = dataProcessor.filter(products(fakeData), { category: 'electronics' });

      for (const product of electronics) {
        expect(product.category).to.equal('electronics');
      }
    });

    s.test(
      'filter by several criteria',
      ['dataProcessor', 'fakeData'],
      ({ dataProcessor, fakeData }) => {
        const [first, ...rest] = products(fakeData);
        if (!first) throw new Error('no products generated');
        const items = [{ ...first, category: 'electronics' as const, quantity: 50 }, ...rest];

        const filtered = dataProcessor.filter(items, { category: 'electronics', quantity: 50 });

        expect(filtered).to.not.be.empty;
        for (const product of filtered) {
          expect(product).to.include({ category: 'electronics', quantity: 50 });
        }
      }
    );

    s.test(
      'full pipeline',
      ['dataProcessor', 'fakeData'],
      async ({ dataProcessor, fakeData }) => {
        const items = products(fakeData);
        const category = items[0]?.category;

        const filtered = dataProcessor.filter(dataProcessor.transform(items), { category });
        const jsonPath = await dataProcessor.saveJson({ filtered }, 'filtered.json');
        const csvPath = await dataProcessor.saveCsv(filtered, 'filtered.csv');

        const json = await dataProcessor.loadJsonAs('filtered.json', recordsEnvelope('filtered'));
        const csv = await dataProcessor.loadCsv('filtered.csv');

        expect(await exists(jsonPath)).to.equal(true);
        expect(await exists(csvPath)).to.equal(true);
        expect(json.filtered).to.have.lengthOf(filtered.length);
        expect(csv).to.have.lengthOf(filtered.length);
      },
      { tags: ['slow'] }
    );

    s.test('empty data', ['dataProcessor'], async ({ dataProcessor }) => {
      expect(dataProcessor.transform([])).to.deep.equal([]);
      expect(dataProcessor.filter([], { anyField: 'value' })).to.deep.equal([]);

      const path = await dataProcessor.saveCsv([], 'empty.csv');
      expect(await exists(path)).to.equal(true);
      expect(await dataProcessor.loadCsv('empty.csv')).to.deep.equal([]);
    });

    s.test(
      'consistency across formats',
      ['dataProcessor', 'fakeData'],
      async ({ dataProcessor, fakeData }) => {
        const transformed = dataProcessor.transform(people(fakeData));

        await dataProcessor.saveJson({ users: transformed }, 'users.json');
        await dataProcessor.saveCsv(transformed, 'users.csv');

        const json = (await dataProcessor.loadJsonAs('users.json', recordsEnvelope('users'))).users;
        const csv = await dataProcessor.loadCsv('users.csv');

        expect(json).to.have.lengthOf(csv.length);
        json.forEach((user, index) => {
          const row = csv[index];
          for (const key of ['firstName', 'lastName', 'email', 'fullName']) {
            expect(row?.[key], key).to.equal(user[key]);
          }
        });
      }
    );

    s.each(
      [10, 100, 1000],
      (count) => `round trip of ${count} records`,
      ['dataProcessor', 'fakeData'],
      async ({ dataProcessor, fakeData }, count) => {
        const records = take(
          sequence((id) => ({ id, name: fakeData.name(), value: fakeData.int(0, 1_000_000) })),
          count
        );
        const started = Date.now();

        await dataProcessor.saveJson({ data: records }, `large_${count}.json`);
        const loaded = await dataProcessor.loadJsonAs(
          `large_${count}.json`,
          recordsEnvelope('data')
        );

        expect(loaded.data).to.have.lengthOf(count);
        expect(Date.now() - started).to.be.below(5000);
      }
    );

    s.test('malformed json', ['dataProcessor'], async ({ dataProcessor }) => {
      await writeFile(dataProcessor.pathOf('invalid.json'), '{ invalid json }', 'utf-8');

      const error = await dataProcessor.loadJson('invalid.json').then(
        () => undefined,
        (reason: unknown) => reason
      );
      expect(error).to.be.instanceOf(DataFormatError);
    });

    s.test('missing file', ['dataProcessor'], async ({ dataProcessor }) => {
      const error = await dataProcessor.loadJson('nonexistent.json').then(
        () => undefined,
        (reason: unknown) => reason
      );
      expect(error).to.be.instanceOf(Error).and.to.have.property('code', 'ENOENT');
    });

    s.test('unicode round trip', ['dataProcessor'], async ({ dataProcessor }) => {
      const unicode = {
        русский: 'текст',
        中文: '文字',
        emoji: '😀🎉',
        special: '©®™',
      };

      await dataProcessor.saveJson(unicode, 'unicode.json');
      expect(await dataProcessor.loadJson('unicode.json')).to.deep.equal(unicode);
    });

    s.test('test data file', ['testData'], ({ testData }) => {
      expect(testData).to.be.an('object');
    });
  }
);
