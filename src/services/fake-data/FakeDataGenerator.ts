import type { SampleProduct, SampleUser } from '@/types/index.ts';
import { productCategories } from '@/types/index.ts';
import { Faker, base, en, ru } from '@faker-js/faker';

export interface FakeDataOptions {
  /** Fixed seed for reproducible data */
  seed?: number;
}

/**
 * Lazy, restartable, infinite sequence
 * Every iteration starts from index 0 and draws fresh values.
 */
export function sequence<T>(factory: (index: number) => T): Iterable<T> {
  return {
    *[Symbol.iterator]() {
      for (let index = 0; ; index++) {
        yield factory(index);
      }
    },
  };
}

/**
 * First n values of an iterable
 */
export function take<T>(iterable: Iterable<T>, count: number): T[] {
  const values: T[] = [];
  if (count <= 0) return values;

  for (const value of iterable) {
    values.push(value);
    if (values.length >= count) break;
  }
  return values;
}

/**
 * FakeDataGenerator
 * Synthetic names, addresses, numbers and records; Russian locale with English fallback
 */
export class FakeDataGenerator {
  readonly faker: Faker;
  readonly seed: number | undefined;

  constructor(options: FakeDataOptions = {}) {
    this.faker = new Faker({ locale: [ru, en, base] });
    this.seed = options.seed;

    if (options.seed !== undefined) {
      this.faker.seed(options.seed);
    }
  }

  name(): string {
    return this.faker.person.fullName();
  }

  address(): SampleUser['address'] {
    return {
      street: this.faker.location.streetAddress(),
      city: this.faker.location.city(),
      zipcode: this.faker.location.zipCode(),
    };
  }

  int(min: number, max: number): number {
    return this.faker.number.int({ min, max });
  }

  user(): SampleUser {
    return {
      name: this.name(),
      email: this.faker.internet.email(),
      username: this.faker.internet.userName(),
      password: this.faker.internet.password(),
      phone: this.faker.phone.number(),
      address: this.address(),
    };
  }

  product(): SampleProduct {
    return {
      title: this.faker.company.catchPhrase(),
      description: this.faker.lorem.paragraph().slice(0, 200),
      price: this.int(0, 9999),
      category: this.faker.helpers.arrayElement(productCategories),
      stock: this.int(0, 100),
    };
  }

  names(): Iterable<string> {
    return sequence(() => this.name());
  }

  addresses(): Iterable<SampleUser['address']> {
    return sequence(() => this.address());
  }

  numbers(min: number, max: number): Iterable<number> {
    return sequence(() => this.int(min, max));
  }

  users(): Iterable<SampleUser> {
    return sequence(() => this.user());
  }

  products(): Iterable<SampleProduct> {
    return sequence(() => this.product());
  }
}
