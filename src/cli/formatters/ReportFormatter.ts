export const OUTPUT_FORMATS = ['json', 'text'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** CLI 報告格式化器：json 原樣輸出，text 平展為縮排的 key: value */
export class ReportFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      if (data.length === 0) return `${prefix}(none)`;
      return data
        .map((item, i) => {
          if (typeof item === 'object' && item !== null) {
            return `${prefix}[${i}]\n${this.flattenToText(item, indent + 1)}`;
          }
          return `${prefix}[${i}] ${String(item)}`;
        })
        .join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
