/**
 * Server-side checks and report interpretation. Mesh analysis itself runs
 * in the host; this module only applies thresholds and wording.
 */

// ─── Scale ───────────────────────────────────────────────────

/** HO model railroad scale, 1:87.1. */
export const HO_SCALE = 1 / 87.1;

/** Resin printer thresholds at target scale (mm). */
export const RESIN_WARN_MM = 0.3;
export const RESIN_ERROR_MM = 0.05;

export const EXPORT_FORMATS = ['stl', 'obj', 'ply'] as const;

export const IMPORT_FORMATS = ['stl', 'obj', 'ply'] as const;

/** Prototype metres to HO millimetres. */
export function prototypeToHo(valueM: number): number {
  return valueM * HO_SCALE * 1000;
}

/** HO millimetres to prototype metres. */
export function hoToPrototype(valueMm: number): number {
  return valueMm / 1000 / HO_SCALE;
}

// ─── Printability ────────────────────────────────────────────

export interface PrintabilityInterpretation {
  summary: string;
  issues: string[];
  warnings: string[];
  recommendations: string[];
}

function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function record(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function formatLocation(value: unknown): string {
  return Array.isArray(value) ? `[${value.join(', ')}]` : 'unknown';
}

/** Add summary, issues, warnings and recommendations to a raw check_printability result. */
export function interpretPrintability<T extends Record<string, unknown>>(result: T): T & PrintabilityInterpretation {
  const issues: string[] = [];
  const warnings: string[] = [];
  const recommendations: string[] = [];

  if (result.is_manifold !== true) {
    issues.push(
      `Non-manifold geometry: ${num(result.non_manifold_edges)} edges, ${num(result.non_manifold_verts)} vertices. ` +
        'The mesh has holes or internal faces and will not print reliably.',
    );
    recommendations.push('Close the holes or remesh the object into a single watertight shell before export.');
  }

  const loose = record(result.loose_geometry);
  const looseVerts = num(loose.vertices);
  const looseEdges = num(loose.edges);
  if (looseVerts > 0 || looseEdges > 0) {
    issues.push(
      `Loose geometry: ${looseVerts} vertices, ${looseEdges} edges not connected to faces. ` +
        'These will create stray fragments in the print.',
    );
    recommendations.push('Delete vertices and edges that belong to no face.');
  }

  const degenerate = num(result.degenerate_faces);
  if (degenerate > 0) {
    issues.push(`${degenerate} degenerate (zero-area) faces. May cause slicer errors.`);
    recommendations.push('Dissolve or merge the zero-area faces.');
  }

  if (num(result.self_intersections) > 0) {
    warnings.push('Self-intersecting faces detected. Resin slicers typically handle these but CNC toolpaths may fail.');
  }

  const thin = Array.isArray(result.thin_features) ? result.thin_features : [];
  for (const raw of thin) {
    const feature = record(raw);
    if (!('min_dimension_scaled_mm' in feature)) continue;
    const dimMm = num(feature.min_dimension_scaled_mm);
    const where = formatLocation(feature.location);
    if (dimMm < RESIN_ERROR_MM) {
      issues.push(
        `Feature at ${where}: ${dimMm.toFixed(3)}mm at target scale is below resin printer resolution (${RESIN_ERROR_MM}mm). Will not resolve.`,
      );
    } else if (dimMm < RESIN_WARN_MM) {
      warnings.push(
        `Feature at ${where}: ${dimMm.toFixed(3)}mm at target scale is below the recommended minimum (${RESIN_WARN_MM}mm). May be fragile.`,
      );
    }
  }

  const printable = result.printable === true;
  let summary: string;
  if (printable && issues.length === 0 && warnings.length === 0) {
    summary = 'Mesh is print-ready.';
  } else if (printable && issues.length === 0) {
    summary = `Mesh is print-ready with ${warnings.length} warning(s).`;
  } else {
    summary = `Mesh has ${issues.length} issue(s) that should be resolved before printing.`;
  }

  return { ...result, summary, issues, warnings, recommendations };
}

// ─── Parameters ──────────────────────────────────────────────

/** Error message for bad export parameters, or null when they are usable. */
export function validateExportParams(
  filepath: string,
  format: string,
  scale: number,
  objects: string[] | undefined,
): string | null {
  if (!filepath.trim()) return 'filepath must not be empty';
  if (!isOneOf(EXPORT_FORMATS, format)) {
    return `format must be one of ${EXPORT_FORMATS.join(', ')}, got '${format}'`;
  }
  if (!(scale > 0) || !Number.isFinite(scale)) return `scale must be positive, got ${scale}`;
  if (objects !== undefined && objects.length === 0) {
    return 'objects list is empty; omit it to export the selected objects';
  }
  return null;
}

/** Error message for bad import parameters, or null. A missing format means "detect from the extension". */
export function validateImportParams(filepath: string, format: string | undefined, scale: number): string | null {
  if (!filepath.trim()) return 'filepath must not be empty';
  if (format !== undefined && !isOneOf(IMPORT_FORMATS, format)) {
    return `format must be one of ${IMPORT_FORMATS.join(', ')}, or omitted to detect it from the extension, got '${format}'`;
  }
  if (!(scale > 0) || !Number.isFinite(scale)) return `scale must be positive, got ${scale}`;
  return null;
}

function isOneOf<T extends string>(options: readonly T[], value: string): value is T {
  return options.some((option) => option === value);
}
