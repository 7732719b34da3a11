// src/core/render/content-bounds.ts
import type { Page } from 'playwright';
import type { BoundingBox } from '../types/index.js';

export interface ContentSelectorTable {
  /** Diagram roots; every visible match is merged into one box. */
  preferred: readonly string[];
  /** Consulted only when no preferred root is visible. */
  generic: readonly string[];
}

// Append-only: a new layout family registers its root class here.
export const CONTENT_SELECTORS: ContentSelectorTable = Object.freeze({
  preferred: Object.freeze([
    '.premium-card-stage',
    '.story-slide-container',
    '.hero-card',
    '.data-card-container',
    '.infographic-container',
    '.story-driven-container',
    '.slide-cards-container',
    '.slide-comparison-container',
    '.cycle-container',
    '.comparison',
    '.timeline-container',
    '.flywheel-container',
    '[data-export-root]',
    'main',
    '[role="main"]',
    'article',
  ]),
  generic: Object.freeze([
    'svg',
    'canvas',
    'img',
    'h1',
    'h2',
    'h3',
    'p',
    '[class*="card"]',
    '[class*="panel"]',
  ]),
});

/**
 * Runs inside the page, so it must not reference anything outside its own
 * body. Returns the union of visible rects for the first tier that has any.
 */
export function measureContentBounds(table: ContentSelectorTable): BoundingBox | null {
  const MIN_SIZE = 2;

  const visibleRects = (selectors: readonly string[]) => {
    const rects: DOMRect[] = [];
    for (const selector of selectors) {
      let nodes: Element[];
      try {
        nodes = Array.from(document.querySelectorAll(selector));
      } catch {
        continue;
      }
      for (const node of nodes) {
        const style = getComputedStyle(node);
        if (style.display === 'none' || style.visibility === 'hidden') continue;
        const rect = node.getBoundingClientRect();
        if (rect.width > MIN_SIZE && rect.height > MIN_SIZE) {
          rects.push(rect);
        }
      }
    }
    return rects;
  };

  const union = (rects: DOMRect[]) => {
    let left = Infinity;
    let top = Infinity;
    let right = -Infinity;
    let bottom = -Infinity;
    for (const rect of rects) {
      left = Math.min(left, rect.left);
      top = Math.min(top, rect.top);
      right = Math.max(right, rect.left + rect.width);
      bottom = Math.max(bottom, rect.top + rect.height);
    }
    return { x: left, y: top, width: right - left, height: bottom - top };
  };

  const preferred = visibleRects(table.preferred);
  if (preferred.length > 0) {
    return union(preferred);
  }

  const generic = visibleRects(table.generic);
  if (generic.length > 0) {
    return union(generic);
  }

  return null;
}

export async function detectContentBounds(
  page: Page,
  table: ContentSelectorTable = CONTENT_SELECTORS
): Promise<BoundingBox | null> {
  return page.evaluate(measureContentBounds, {
    preferred: [...table.preferred],
    generic: [...table.generic],
  });
}
