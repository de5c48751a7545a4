import { slugifyHeader } from '../mapping/columns';
import type { MetricCatalogInput } from '../stores/types';

const UNIT_SUFFIX = /^(.*?)\s*[([]\s*([^()[\]]+?)\s*[)\]]\s*$/;

/**
 * Normalizes a raw metric name into its catalog identity. The key is the
 * slug of the full name, so "Depth (m)" and "Depth (ft)" stay distinct.
 */
export function describeMetric(rawName: string): MetricCatalogInput | null {
  const name = rawName.trim();
  const key = slugifyHeader(name);
  if (!key) {
    return null;
  }
  const match = UNIT_SUFFIX.exec(name);
  if (match && match[1].trim().length > 0) {
    return { key, label: match[1].trim(), unit: match[2] };
  }
  return { key, label: name, unit: null };
}
