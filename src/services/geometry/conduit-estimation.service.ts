import type { GeometryConfig, ProjectConfig } from '../../config/project-config.schema';
import type { LineSegment, VectorPath } from '../../types/document';
import type { ConduitResolution, CountSnapshot, LengthSnapshot } from '../../types/takeoff';
import { flattenCounts, sumCounts } from '../../utils/count-snapshot';

const POINTS_PER_INCH = 72;

export type ConduitOptions = Pick<ProjectConfig, 'conduit' | 'floorCount' | 'buildingSqft'>;

/** Drawing points per real foot, e.g. 1/8" = 1'-0" gives 9. */
export const pointsPerFoot = (paperInchesPerFoot: number): number =>
  POINTS_PER_INCH * paperInchesPerFoot;

export const segmentLength = ({ start, end }: LineSegment): number =>
  Math.hypot(end.x - start.x, end.y - start.y);

/**
 * Smallest configured width that covers the stroke within the slack factor;
 * anything wider lands in the default class.
 */
export const classifyStrokeWidth = (width: number, geometry: GeometryConfig): string => {
  const ordered = [...geometry.widthClasses].sort((a, b) => a.width - b.width);
  const match = ordered.find((entry) => width <= entry.width * geometry.slack);
  return match ? match.sizeClass : geometry.defaultSizeClass;
};

/**
 * Feet of run per size class. `undefined` paths means the source had no vector
 * data and yields `{}`, which callers must not read as zero conduit.
 */
export const estimateLengths = (
  paths: readonly VectorPath[] | undefined,
  geometry: GeometryConfig,
): LengthSnapshot => {
  if (!paths) {
    return {};
  }
  const scale = pointsPerFoot(geometry.paperInchesPerFoot);
  const lengths: LengthSnapshot = {};
  for (const path of paths) {
    const points = path.segments.reduce((total, segment) => total + segmentLength(segment), 0);
    if (points <= 0) {
      continue;
    }
    const sizeClass = classifyStrokeWidth(path.strokeWidth, geometry);
    lengths[sizeClass] = (lengths[sizeClass] ?? 0) + points / scale;
  }
  return lengths;
};

export const mergeLengthSnapshots = (...snapshots: LengthSnapshot[]): LengthSnapshot => {
  const merged: LengthSnapshot = {};
  for (const snapshot of snapshots) {
    for (const [sizeClass, feet] of Object.entries(snapshot)) {
      merged[sizeClass] = (merged[sizeClass] ?? 0) + feet;
    }
  }
  return merged;
};

/** Truncates to whole feet for reporting; classes that round to zero drop out. */
export const roundLengths = (snapshot: LengthSnapshot): LengthSnapshot =>
  Object.fromEntries(
    Object.entries(snapshot)
      .map(([sizeClass, feet]): [string, number] => [sizeClass, Math.trunc(feet)])
      .filter(([, feet]) => feet > 0),
  );

export const hasLengths = (snapshot: LengthSnapshot | undefined): snapshot is LengthSnapshot =>
  snapshot !== undefined && Object.values(snapshot).some((feet) => feet > 0);

/**
 * Conduit estimate from device counts when a drawing has no usable geometry:
 * per-device runs or circuit homeruns (whichever is longer), feeders from floor
 * area, and a riser allowance per additional floor.
 */
export const estimateConduitFromDevices = (
  counts: CountSnapshot,
  options: ConduitOptions,
): LengthSnapshot => {
  const estimate = options.conduit.estimate;
  const flat = flattenCounts(counts);
  const lighting = sumCounts(flat, estimate.lightingKeys);
  const power = sumCounts(flat, estimate.powerKeys);
  const control = sumCounts(flat, estimate.controlKeys);

  const lightingCircuits = Math.max(1, Math.floor(lighting / estimate.lightingDevicesPerCircuit));
  const powerCircuits = Math.max(1, Math.floor(power / estimate.powerDevicesPerCircuit));

  const raw: Array<[string, number]> = [
    [estimate.sizeClasses.control, control * estimate.controlFtPerDevice],
    [
      estimate.sizeClasses.lighting,
      Math.max(
        lighting * estimate.lightingFtPerDevice,
        lightingCircuits * estimate.lightingFtPerCircuit,
      ) +
        (options.floorCount - 1) * estimate.riserFtPerFloor,
    ],
    [
      estimate.sizeClasses.power,
      Math.max(power * estimate.powerFtPerDevice, powerCircuits * estimate.powerFtPerCircuit),
    ],
    [estimate.sizeClasses.feeder, Math.floor(options.buildingSqft / estimate.sqftPerFeederFt)],
  ];

  const lengths: LengthSnapshot = {};
  for (const [sizeClass, feet] of raw) {
    lengths[sizeClass] = (lengths[sizeClass] ?? 0) + feet;
  }
  for (const [sizeClass, feet] of Object.entries(lengths)) {
    lengths[sizeClass] = Math.max(estimate.minimums[sizeClass] ?? 0, feet);
  }
  return lengths;
};

/**
 * Picks the conduit source. Reference lengths and the device estimate are
 * explicit choices; the vector source only falls back to the device estimate
 * when `deviceEstimateFallback` is on.
 */
export const resolveConduit = (
  measured: LengthSnapshot,
  counts: CountSnapshot,
  options: ConduitOptions,
): ConduitResolution => {
  const { conduit } = options;
  switch (conduit.source) {
    case 'reference':
      return hasLengths(conduit.reference)
        ? { method: 'reference', lengths: { ...conduit.reference } }
        : { method: 'none', lengths: {} };
    case 'device':
      return { method: 'device', lengths: estimateConduitFromDevices(counts, options) };
    case 'vector':
      if (hasLengths(measured)) {
        return { method: 'vector', lengths: measured };
      }
      if (conduit.deviceEstimateFallback) {
        return { method: 'device', lengths: estimateConduitFromDevices(counts, options) };
      }
      return { method: 'none', lengths: {} };
  }
};
