import { COUNT_CATEGORIES } from '../types/takeoff';
import { conduitItem, type TakeoffResult } from './takeoff-pipeline.service';

export type MaterialSection = 'new_work' | 'demolition' | 'derived' | 'conduit';

export interface MaterialItemResponse {
  item: string;
  qty: number;
  uom: 'ea' | 'ft';
  category: MaterialSection;
}

export interface MaterialsResponse {
  projectName: string;
  items: MaterialItemResponse[];
  summary: {
    totalItems: number;
    totalQuantity: number;
    categories: MaterialSection[];
    generatedAt: string;
  };
}

// "(ft)" items and wire by gauge are sold by the foot
const FOOTAGE_ITEM = /\(ft\)$|\bTHHN$/;

const unitOf = (item: string): MaterialItemResponse['uom'] => (FOOTAGE_ITEM.test(item) ? 'ft' : 'ea');

const section = (
  category: MaterialSection,
  quantities: Record<string, number>,
  uom?: MaterialItemResponse['uom'],
): MaterialItemResponse[] =>
  Object.entries(quantities)
    .filter(([, qty]) => qty > 0)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([item, qty]) => ({ item, qty, uom: uom ?? unitOf(item), category }));

export const buildMaterialList = (
  result: TakeoffResult,
  generatedAt: Date = new Date(),
): MaterialsResponse => {
  const newWork: Record<string, number> = {};
  for (const category of COUNT_CATEGORIES) {
    if (category === 'demo') {
      continue;
    }
    for (const [item, qty] of Object.entries(result.counts[category] ?? {})) {
      newWork[item] = (newWork[item] ?? 0) + qty;
    }
  }

  const conduit = Object.fromEntries(
    Object.entries(result.conduit.lengths).map(([sizeClass, feet]) => [conduitItem(sizeClass), feet]),
  );

  const items = [
    ...section('new_work', newWork),
    ...section('demolition', result.counts.demo ?? {}),
    ...section('derived', result.derived),
    ...section('conduit', conduit, 'ft'),
  ];

  const categories = Array.from(new Set(items.map((item) => item.category)));

  return {
    projectName: result.projectName,
    items,
    summary: {
      totalItems: items.length,
      totalQuantity: items.reduce((sum, item) => sum + item.qty, 0),
      categories,
      generatedAt: generatedAt.toISOString(),
    },
  };
};
