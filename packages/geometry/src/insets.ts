/**
 * Edge insets: per-edge distances that move a rectangle's edges inward.
 * See `rectangleInset`.
 */

import type { EdgeInsets } from "./types.js";

export function edgeInsets(
  top: number,
  leading: number,
  bottom: number,
  trailing: number
): EdgeInsets {
  return { top, leading, bottom, trailing };
}

/** The same inset on every edge */
export function uniformInsets(all: number): EdgeInsets {
  return edgeInsets(all, all, all, all);
}

/** `horizontal` on the leading and trailing edges, `vertical` on top and bottom */
export function symmetricInsets(horizontal: number, vertical: number): EdgeInsets {
  return edgeInsets(vertical, horizontal, vertical, horizontal);
}

export const zeroInsets: EdgeInsets = edgeInsets(0, 0, 0, 0);

/** Edge-wise sum */
export function combineInsets(a: EdgeInsets, b: EdgeInsets): EdgeInsets {
  return edgeInsets(
    a.top + b.top,
    a.leading + b.leading,
    a.bottom + b.bottom,
    a.trailing + b.trailing
  );
}

export function mapInsets(insets: EdgeInsets, f: (value: number) => number): EdgeInsets {
  return edgeInsets(f(insets.top), f(insets.leading), f(insets.bottom), f(insets.trailing));
}
