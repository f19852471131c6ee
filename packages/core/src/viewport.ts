import type { BoundingBox, CropRect, Point, ViewMetrics } from './types.js';

/** Rectangle in screen pixels. */
export interface ScreenRect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** BB-normalized point → screen. The anchor lands on view.center. */
export function bbToScreen(p: Point, anchor: Point, bb: BoundingBox, view: ViewMetrics): Point {
  return {
    x: view.center.x + (p.x - anchor.x) * bb.width * view.scale,
    y: view.center.y + (p.y - anchor.y) * bb.height * view.scale,
  };
}

export function screenToBB(s: Point, anchor: Point, bb: BoundingBox, view: ViewMetrics): Point {
  return {
    x: anchor.x + (s.x - view.center.x) / (bb.width * view.scale),
    y: anchor.y + (s.y - view.center.y) / (bb.height * view.scale),
  };
}

/** Screen-pixel delta → BB-normalized delta. */
export function screenDeltaToBB(dx: number, dy: number, bb: BoundingBox, view: ViewMetrics): Point {
  return { x: dx / (bb.width * view.scale), y: dy / (bb.height * view.scale) };
}

export function cropToScreenRect(
  crop: CropRect,
  anchor: Point,
  bb: BoundingBox,
  view: ViewMetrics,
): ScreenRect {
  const tl = bbToScreen({ x: crop.x, y: crop.y }, anchor, bb, view);
  return { x: tl.x, y: tl.y, w: crop.w * bb.width * view.scale, h: crop.h * bb.height * view.scale };
}

/**
 * Scale at which the whole bounding box fits a viewport, leaving `padding`
 * pixels on every side.
 */
export function fitScale(bb: BoundingBox, viewW: number, viewH: number, padding: number = 0): number {
  const availW = viewW - padding * 2;
  const availH = viewH - padding * 2;
  if (availW <= 0 || availH <= 0 || bb.width <= 0 || bb.height <= 0) return 1;
  return Math.min(availW / bb.width, availH / bb.height);
}

/** View metrics that put the anchor at the centre of a viewport of the given size. */
export function centeredView(
  bb: BoundingBox,
  viewW: number,
  viewH: number,
  padding: number = 0,
): ViewMetrics {
  return { center: { x: viewW / 2, y: viewH / 2 }, scale: fitScale(bb, viewW, viewH, padding) };
}
