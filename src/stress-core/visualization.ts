import type { MultiPolygon } from 'polygon-clipping';
import { extent, type Point2 } from './linear-algebra';
import type { FaultPatch } from './fault-model';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface PlotScene {
  title: string;
  obsDepth: number;
  samples: readonly Point2[];
  /** CFS per sample, same order as `samples`. */
  cfs: readonly number[];
  outline: MultiPolygon;
  patches: readonly FaultPatch[];
  events: readonly Point2[];
  /** CFS per event, same order as `events`. */
  eventCfs: readonly number[];
}

/** Renders a scene to an image document. May throw. */
export interface ModelVisualizer {
  render(scene: PlotScene): string;
}

export interface RenderOutcome {
  image: string | null;
  error: string | null;
}

// ---------------------------------------------------------------------------
// SVG renderer
// ---------------------------------------------------------------------------

const CFS_CLIP = 1e5;
const CANVAS = 800;
const MARGIN = 40;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Diverging blue-white-red ramp over [-CFS_CLIP, CFS_CLIP]. */
export function cfsColor(value: number): string {
  const t = Math.max(-1, Math.min(1, value / CFS_CLIP));
  const fade = Math.round(255 * (1 - Math.abs(t)));
  return t >= 0 ? `rgb(255,${fade},${fade})` : `rgb(${fade},${fade},255)`;
}

export class SvgPlotRenderer implements ModelVisualizer {
  render(scene: PlotScene): string {
    if (scene.samples.length === 0) {
      throw new Error('Nothing to plot: scene has no samples');
    }
    if (scene.cfs.length !== scene.samples.length) {
      throw new Error(`Expected ${scene.samples.length} CFS values, got ${scene.cfs.length}`);
    }

    const [minX, maxX] = extent(scene.samples.map((p) => p.x));
    const [minY, maxY] = extent(scene.samples.map((p) => p.y));
    const span = Math.max(maxX - minX, maxY - minY) || 1;
    const scale = (CANVAS - 2 * MARGIN) / span;
    const sx = (x: number) => (MARGIN + (x - minX) * scale).toFixed(1);
    // SVG y grows downward
    const sy = (y: number) => (CANVAS - MARGIN - (y - minY) * scale).toFixed(1);

    const parts: string[] = [];
    scene.samples.forEach((p, i) => {
      parts.push(`<circle cx="${sx(p.x)}" cy="${sy(p.y)}" r="3" fill="${cfsColor(scene.cfs[i])}"/>`);
    });

    for (const polygon of scene.outline) {
      for (const ring of polygon) {
        const d = ring.map(([x, y]) => `${sx(x)},${sy(y)}`).join(' ');
        parts.push(`<polyline points="${d}" fill="none" stroke="black" stroke-width="1"/>`);
      }
    }

    for (const patch of scene.patches) {
      const [c1, c2, c3, c4] = patch.projected.corners;
      const d = [c1, c2, c4, c3, c1].map((c) => `${sx(c.x)},${sy(c.y)}`).join(' ');
      parts.push(`<polyline points="${d}" fill="none" stroke="dimgray" stroke-width="0.5"/>`);
    }

    scene.events.forEach((p, i) => {
      const fill = (scene.eventCfs[i] ?? 0) >= 0 ? 'red' : 'blue';
      parts.push(
        `<circle cx="${sx(p.x)}" cy="${sy(p.y)}" r="4" fill="${fill}" stroke="white" stroke-width="1"/>`,
      );
    });

    const positive = scene.eventCfs.filter((v) => v >= 0).length;
    const negative = scene.eventCfs.length - positive;
    const title =
      `${scene.title}: CFS at ${(scene.obsDepth / 1e3).toFixed(1)} km, ` +
      `${positive} events positive, ${negative} negative`;

    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${CANVAS}" height="${CANVAS}" viewBox="0 0 ${CANVAS} ${CANVAS}">`,
      `<rect width="100%" height="100%" fill="white"/>`,
      `<text x="${CANVAS / 2}" y="${MARGIN / 2}" text-anchor="middle" font-size="14">${escapeXml(title)}</text>`,
      ...parts,
      '</svg>',
    ].join('\n');
  }
}

/** Runs the visualizer; a failure is logged and yields `image: null`. */
export function renderSafely(visualizer: ModelVisualizer, scene: PlotScene): RenderOutcome {
  try {
    return { image: visualizer.render(scene), error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[MODEL] Visualization failed: ${message}`);
    return { image: null, error: message };
  }
}
