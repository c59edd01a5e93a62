/**
 * Paints laid out text and lists on a surface.
 */

import type { ListLayout, TextBlockLayout } from '../text/TextLayoutEngine.js';
import type { PositionedTextRun } from '../text/WordWrapper.js';
import type { DrawingSurface, Paint } from './DrawingSurface.js';

export class TextRenderer {
  /**
   * Paints a text element: its shaded background first, then each run.
   */
  paintText(surface: DrawingSurface, layout: TextBlockLayout): void {
    this.withRotation(surface, layout.rotation, layout.origin.x, layout.origin.y, () => {
      const bg = layout.background;
      if (bg) {
        surface.fillRect(bg.x, bg.y, bg.width, bg.height, { color: bg.color, opacity: 1 });
      }
      this.paintRuns(surface, layout.runs, layout.paint);
    });
  }

  /**
   * Paints a list: each item's bullet dot, then its runs.
   */
  paintList(surface: DrawingSurface, layout: ListLayout): void {
    this.withRotation(surface, layout.rotation, layout.origin.x, layout.origin.y, () => {
      for (const item of layout.items) {
        if (item.marker) {
          const { cx, cy, r } = item.marker;
          surface.fillEllipse(cx, cy, r, r, layout.markerPaint);
        }
        this.paintRuns(surface, item.runs, item.paint);
      }
    });
  }

  private paintRuns(surface: DrawingSurface, runs: readonly PositionedTextRun[], paint: Paint): void {
    for (const run of runs) {
      if (run.text.length === 0) {
        continue;
      }
      surface.drawText(run.text, run.x, run.y, run.font, run.anchor, paint);
    }
  }

  private withRotation(surface: DrawingSurface, degrees: number, cx: number, cy: number, draw: () => void): void {
    if (degrees === 0) {
      draw();
      return;
    }
    surface.rotated(degrees, cx, cy, draw);
  }
}
