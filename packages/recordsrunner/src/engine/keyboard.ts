import type { Locator, Page } from 'playwright-core';
import type { Pacing } from './pacing.js';

/**
 * Replace an input's value by typing it one character at a time, with a
 * keystroke pause after each character.
 */
export async function typeLikeHuman(page: Page, input: Locator, value: string, pacing: Pacing): Promise<void> {
  await input.click();
  await page.keyboard.press('Control+A');
  await page.keyboard.press('Delete');
  for (const char of value) {
    await page.keyboard.type(char);
    await pacing.pause('keystroke');
  }
}
