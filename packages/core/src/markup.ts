/**
 * @module markup
 * Inline style markup for console messages.
 *
 *   renderMarkup('Cannot copy <text style="bold white">a.txt</text>', chalk)
 *
 * Style names are chalk modifiers and colours, separated by spaces or
 * underscores (`bold_white` and `bold white` are equivalent). Unknown names
 * are ignored.
 */

import {
  Chalk,
  backgroundColorNames,
  foregroundColorNames,
  modifierNames,
  type BackgroundColorName,
  type ChalkInstance,
  type ForegroundColorName,
  type ModifierName,
} from 'chalk';
import { stripVTControlCharacters } from 'node:util';

type StyleName = ModifierName | ForegroundColorName | BackgroundColorName;

const STYLE_NAMES = new Set<string>([...modifierNames, ...foregroundColorNames, ...backgroundColorNames]);

const SPAN = /<text\s+style="([^"]*)">([\s\S]*?)<\/text>/g;
const ENTITY = /&(lt|amp);/g;

function isStyleName(name: string): name is StyleName {
  return STYLE_NAMES.has(name);
}

/** A chalk instance with colours on (auto-detected level) or forced off. */
export function createPainter(color: boolean): ChalkInstance {
  return color ? new Chalk() : new Chalk({ level: 0 });
}

/** Apply a style string such as `"bold red"` to `text`. */
export function applyStyle(style: string, text: string, painter: ChalkInstance): string {
  let paint = painter;
  for (const name of style.split(/[\s_]+/)) {
    if (isStyleName(name)) paint = paint[name];
  }
  return paint(text);
}

/**
 * Replace every `<text style="…">…</text>` span with its styled contents,
 * then turn `&lt;` and `&amp;` left by {@link escapeMarkup} back into text.
 */
export function renderMarkup(message: string, painter: ChalkInstance): string {
  return message
    .replace(SPAN, (_match, style: string, body: string) => applyStyle(style, body, painter))
    .replace(ENTITY, (_match, name: string) => (name === 'lt' ? '<' : '&'));
}

/** Make `text` (a path, an error message) print literally through {@link renderMarkup}. */
export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;');
}

/** Wrap `text` in a markup span; `text` is printed literally. */
export function styled(style: string, text: string): string {
  return `<text style="${style}">${escapeMarkup(text)}</text>`;
}

/** Printable width of a rendered string (ANSI escapes excluded). */
export function visibleLength(text: string): number {
  return stripVTControlCharacters(text).length;
}
