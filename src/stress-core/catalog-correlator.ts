import type { CatalogEvent, CorrelatedEvent } from './catalog';
import type { FaultModel } from './fault-model';
import { regionContains, type BufferedRegion } from './spatial-buffer';

/**
 * Projects each event into the fault model's frame and keeps the ones
 * strictly inside the region. Events are kept or dropped whole; events
 * without a finite position or depth cannot be evaluated and are dropped.
 */
export function correlate(
  catalog: readonly CatalogEvent[],
  model: Pick<FaultModel, 'project' | 'epicenter'>,
  region: BufferedRegion,
): CorrelatedEvent[] {
  const located = catalog.filter(
    (event) =>
      Number.isFinite(event.latitude) &&
      Number.isFinite(event.longitude) &&
      Number.isFinite(event.depth),
  );
  if (located.length < catalog.length) {
    console.warn(`[CATALOG] Dropped ${catalog.length - located.length} event(s) without a location`);
  }

  return located
    .map((event): CorrelatedEvent => {
      const { x, y } = model.project(event.longitude, event.latitude);
      return {
        ...event,
        x,
        y,
        distanceToEpicenter: Math.hypot(x - model.epicenter.x, y - model.epicenter.y),
      };
    })
    .filter((event) => regionContains(region, event));
}
