import type { Dictionary } from '../../compose/utils/dictionary';

export type UnitEntry = [key: string, value: string];

export interface UnitSection {
  name: string;
  entries: UnitEntry[];
}

export const fromValues = (key: string, values: string[]): UnitEntry[] => values.map((value): UnitEntry => [key, value]);

export const fromRecord = (key: string, record: Dictionary<string>, format: (entry: string) => string = (entry) => entry): UnitEntry[] => {
  return Object.entries(record).map(([name, value]): UnitEntry => [key, format(`${name}=${value}`)]);
};

export const formatUnitFile = (sections: UnitSection[]): string => {
  const blocks = sections.map((section) => {
    return [`[${section.name}]`, ...section.entries.map(([key, value]) => `${key}=${value}`)].join('\n');
  });
  return `${blocks.join('\n\n')}\n`;
};
