/**
 * Stowplan - Packing Report
 *
 * Summaries and diagnostics for a finished packing run: counts, load and
 * weight utilization, why each leftover unit was not loaded, and insights
 * derived from those numbers.
 */

import { Dimensions, PackingResult, RotationIndex, UnfittedReason, Vector3 } from '../types';
import { containerVolume, formatDimensions, getVolume } from '../solver/entities';
import { getUnfittedCountsByName } from '../solver/packingEngine';

// ============================================================================
// TYPES
// ============================================================================

export interface PackedDetail {
  item_id: string;
  name: string;
  dimensions: Dimensions;
  position: Vector3;
  rotation: RotationIndex;
}

export interface UnfittedDiagnostic {
  item_id: string;
  name: string;
  dimensions: Dimensions;
  weight: number;
  reason: UnfittedReason;
}

export interface ReportInsight {
  id: string;
  severity: 'info' | 'warning';
  title: string;
  description: string;
}

export interface PackingReport {
  container_name: string;
  total_count: number;
  packed_count: number;
  unfitted_count: number;
  load_efficiency: number;
  packed_volume: number;
  container_volume: number;
  packed_weight: number;
  max_weight: number;
  weight_utilization: number;
  unfitted_by_name: Record<string, number>;
  packed_details: PackedDetail[];
  unfitted_details: UnfittedDiagnostic[];
  insights: ReportInsight[];
}

const LOW_EFFICIENCY_PERCENT = 50;

// ============================================================================
// INSIGHTS
// ============================================================================

function countOf(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function describeCounts(counts: Record<string, number>): string {
  return Object.entries(counts)
    .map(([name, count]) => `${name} (${count})`)
    .join(', ');
}

function buildInsights(
  report: Omit<PackingReport, 'insights'>
): ReportInsight[] {
  const insights: ReportInsight[] = [];
  const details = report.unfitted_details;

  if (report.unfitted_count === 0) {
    insights.push({
      id: 'all_packed',
      severity: 'info',
      title: 'All Items Loaded',
      description: report.packed_count === 1
        ? `The only item fits in ${report.container_name}.`
        : `All ${report.packed_count} items fit in ${report.container_name}.`
    });
    return insights;
  }

  insights.push({
    id: 'unfitted_items',
    severity: 'warning',
    title: 'Items Left Behind',
    description: `${report.unfitted_count} of ${countOf(report.total_count, 'item')} could not be loaded: ${describeCounts(report.unfitted_by_name)}.`
  });

  const oversize = details.filter(d => d.reason === 'OVERSIZE');
  if (oversize.length > 0) {
    const names = [...new Set(oversize.map(d => d.name))];
    insights.push({
      id: 'oversize_items',
      severity: 'warning',
      title: 'Items Larger Than Container',
      description: `${names.join(', ')} cannot fit in ${report.container_name} in any orientation.`
    });
  }

  const weightBound = details.filter(
    d => d.reason === 'OVERWEIGHT' || d.reason === 'WEIGHT_CAPACITY_REACHED'
  );
  if (weightBound.length > 0) {
    insights.push({
      id: 'weight_limited',
      severity: 'warning',
      title: 'Weight Limit Reached',
      description: `${countOf(weightBound.length, 'item')} ${weightBound.length === 1 ? 'was' : 'were'} held back by the ${report.max_weight} weight limit; ${report.weight_utilization.toFixed(1)}% of it is used.`
    });
  }

  const spaceBound = details.filter(d => d.reason === 'NO_SPACE');
  if (spaceBound.length > 0) {
    const missingVolume = spaceBound.reduce((sum, d) => sum + getVolume(d.dimensions), 0);
    const percentOfContainer = (missingVolume / report.container_volume) * 100;
    const single = spaceBound.length === 1;
    insights.push({
      id: 'volume_needed',
      severity: 'info',
      title: 'Additional Space Needed',
      description: `${countOf(spaceBound.length, 'item')} found no free space. ${single ? 'It needs' : 'They need'} ${percentOfContainer.toFixed(1)}% of the container volume; reduce ${single ? 'its' : 'their'} size or use a second container.`
    });
  }

  if (report.packed_count > 0 && report.load_efficiency < LOW_EFFICIENCY_PERCENT) {
    insights.push({
      id: 'low_efficiency',
      severity: 'info',
      title: 'Low Load Efficiency',
      description: `Only ${report.load_efficiency.toFixed(1)}% of the container volume is used while items remain unloaded.`
    });
  }

  return insights;
}

// ============================================================================
// REPORT
// ============================================================================

export function buildPackingReport(result: PackingResult): PackingReport {
  const { container } = result;

  const base: Omit<PackingReport, 'insights'> = {
    container_name: container.name,
    total_count: result.packed.length + result.unfitted.length,
    packed_count: result.packed.length,
    unfitted_count: result.unfitted.length,
    load_efficiency: result.load_efficiency,
    packed_volume: result.packed_volume,
    container_volume: containerVolume(container),
    packed_weight: result.packed_weight,
    max_weight: container.max_weight,
    weight_utilization: (result.packed_weight / container.max_weight) * 100,
    unfitted_by_name: getUnfittedCountsByName(result),
    packed_details: result.packed.map(p => ({
      item_id: p.unit.id,
      name: p.unit.name,
      dimensions: p.unit.dimensions,
      position: p.position,
      rotation: p.rotation
    })),
    unfitted_details: result.unfitted.map(unit => ({
      item_id: unit.id,
      name: unit.name,
      dimensions: unit.dimensions,
      weight: unit.weight,
      reason: result.unfitted_reasons[unit.id]
    }))
  };

  return { ...base, insights: buildInsights(base) };
}

function formatPosition({ x, y, z }: Vector3): string {
  return `(${x}, ${y}, ${z})`;
}

/**
 * Plain-text summary: totals, then the colour legend when `colors` is
 * given, one line per packed unit and one per unfitted unit.
 */
export function formatPackingReport(
  report: PackingReport,
  colors?: Record<string, string>
): string {
  const lines = [
    `Container: ${report.container_name}`,
    `Fitted items: ${report.packed_count}`,
    `Unfitted items: ${report.unfitted_count}`,
    `Load efficiency: ${report.load_efficiency.toFixed(1)}%`,
    `Weight: ${report.packed_weight} / ${report.max_weight} (${report.weight_utilization.toFixed(1)}%)`
  ];

  if (colors) {
    lines.push('Colour legend:');
    for (const [name, color] of Object.entries(colors)) {
      lines.push(`  ${name}: ${color}`);
    }
  }

  if (report.packed_details.length > 0) {
    lines.push('Packed:');
    for (const item of report.packed_details) {
      lines.push(
        `  ${item.item_id} ${formatDimensions(item.dimensions)} at ${formatPosition(item.position)}, rotation ${item.rotation}`
      );
    }
  }

  if (report.unfitted_count === 0) {
    lines.push('All items loaded');
  } else {
    lines.push('Unfitted by name:');
    for (const [name, count] of Object.entries(report.unfitted_by_name)) {
      lines.push(`  ${name}: ${count}`);
    }
    lines.push('Unfitted:');
    for (const item of report.unfitted_details) {
      lines.push(
        `  ${item.item_id} ${formatDimensions(item.dimensions)}, weight ${item.weight} (${item.reason})`
      );
    }
  }

  return lines.join('\n');
}
