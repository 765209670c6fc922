import type { Locator, Page } from 'playwright-core';

/**
 * Ordered "first success wins" evaluation of page probes.
 *
 * The portal's structure is unknown ahead of time, so every stage is a
 * priority list of candidate shapes. Each candidate pairs a `match` (does this
 * shape exist on the page right now?) with an `act` (do the thing to it). A
 * thrown error in either half counts as a miss and the next candidate runs.
 */

export interface Matcher<M, R> {
  label: string;
  match: () => Promise<M | null>;
  act: (matched: M) => Promise<R>;
}

export interface ProbeHit<R> {
  label: string;
  value: R;
  /** 1-based position of the winning matcher */
  tried: number;
}

export interface ProbeOptions {
  onMiss?: (label: string, error?: unknown) => void;
}

export async function firstSuccess<M, R>(
  matchers: ReadonlyArray<Matcher<M, R>>,
  options: ProbeOptions = {},
): Promise<ProbeHit<R> | null> {
  let tried = 0;

  for (const matcher of matchers) {
    tried++;
    let matched: M | null;
    try {
      matched = await matcher.match();
    } catch (err) {
      options.onMiss?.(matcher.label, err);
      continue;
    }
    if (matched === null) {
      options.onMiss?.(matcher.label);
      continue;
    }

    try {
      const value = await matcher.act(matched);
      return { label: matcher.label, value, tried };
    } catch (err) {
      options.onMiss?.(matcher.label, err);
    }
  }

  return null;
}

/**
 * Resolve the first element matching `selector` that becomes visible within
 * `timeoutMs`, or null.
 */
export async function findVisible(page: Page, selector: string, timeoutMs: number): Promise<Locator | null> {
  const locator = page.locator(selector).first();
  try {
    await locator.waitFor({ state: 'visible', timeout: timeoutMs });
    return locator;
  } catch {
    return null;
  }
}

/** A matcher over a CSS/Playwright selector with a per-pattern time budget. */
export function selectorMatcher<R>(
  page: Page,
  selector: string,
  timeoutMs: number,
  act: (locator: Locator) => Promise<R>,
): Matcher<Locator, R> {
  return {
    label: selector,
    match: () => findVisible(page, selector, timeoutMs),
    act,
  };
}
