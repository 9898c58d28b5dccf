import { defineSuite } from '@core/harness/suite.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import { expect } from 'chai';
import type { Page } from 'playwright';

export const TODO_MVC_URL = 'https://todomvc.com/examples/react/dist/';

async function addTodo(page: Page, text: string): Promise<void> {
  const input = page.locator('.new-todo');
  await input.fill(text);
  await input.press('Enter');
}

/**
 * TodoMVC single-page app
 */
export const todoMvcSuite = defineSuite<HarnessFixtures>(
  { name: 'todo mvc', category: 'ui', file: 'src/suites/ui/todoMvc.ts' },
  (s) => {
    s.test('add todo item', ['page'], async ({ page }) => {
      await page.open(TODO_MVC_URL);
      await page.page.locator('.new-todo').waitFor();

      await addTodo(page.page, 'Изучить Playwright');

      const items = page.page.locator('.todo-list li');
      expect(await items.count()).to.equal(1);
      expect(await items.first().innerText()).to.include('Изучить Playwright');
    });

    s.test('complete todo item', ['page'], async ({ page }) => {
      await page.open(TODO_MVC_URL);
      await addTodo(page.page, 'Задача для выполнения');

      await page.page.locator('.toggle').first().check();

      expect(await page.page.locator('.todo-list li.completed').count()).to.equal(1);
    });

    s.test('delete todo item', ['page'], async ({ page }) => {
      await page.open(TODO_MVC_URL);
      await addTodo(page.page, 'Задача для удаления');

      const item = page.page.locator('.todo-list li').first();
      await item.hover();
      await item.locator('.destroy').click();

      expect(await page.page.locator('.todo-list li').count()).to.equal(0);
    });

    s.test('edit todo item', ['page'], async ({ page }) => {
      await page.open(TODO_MVC_URL);
      await addTodo(page.page, 'Оригинальный текст');

      await page.page.locator('.todo-list li label').first().dblclick();
      const edit = page.page.locator('.todo-list li.editing .edit');
      await edit.fill('Обновленный текст');
      await edit.press('Enter');

      expect(await page.page.locator('.todo-list li').first().innerText()).to.include(
        'Обновленный текст'
      );
    });

    s.test('filter todos', ['page'], async ({ page }) => {
      await page.open(TODO_MVC_URL);
      await addTodo(page.page, 'Активная задача');
      await addTodo(page.page, 'Выполненная задача');
      await page.page.locator('.toggle').nth(1).check();

      await page.page.getByRole('link', { name: 'Active' }).click();
      expect(await page.page.locator('.todo-list li').count()).to.equal(1);

      await page.page.getByRole('link', { name: 'Completed' }).click();
      expect(await page.page.locator('.todo-list li').count()).to.equal(1);
    });
  }
);
