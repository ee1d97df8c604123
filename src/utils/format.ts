export type InsightFormatters = {
  currency: (value: number, currencyCode: string) => string;
  percent: (value: number) => string;
  ratio: (value: number) => string;
};

export type FormatterOptions = {
  locale?: string;
};

export function createInsightFormatters(options: FormatterOptions = {}): InsightFormatters {
  const locale = options.locale ?? "en-US";
  const currencyFormatters = new Map<string, Intl.NumberFormat>();

  const percentFormatter = new Intl.NumberFormat(locale, {
    minimumFractionDigits: 1,
    maximumFractionDigits: 1
  });

  const currencyFormatterFor = (currencyCode: string): Intl.NumberFormat => {
    const existing = currencyFormatters.get(currencyCode);
    if (existing) return existing;
    const created = new Intl.NumberFormat(locale, { style: "currency", currency: currencyCode });
    currencyFormatters.set(currencyCode, created);
    return created;
  };

  const percent = (value: number): string => {
    const numeric = Number(value);
    if (!Number.isFinite(numeric)) {
      return `${percentFormatter.format(0)}%`;
    }
    return `${percentFormatter.format(numeric)}%`;
  };

  return {
    currency: (value, currencyCode) => {
      const numeric = Number(value);
      return currencyFormatterFor(currencyCode).format(Number.isFinite(numeric) ? numeric : 0);
    },
    percent,
    ratio: (value) => `${(Number.isFinite(value) ? value : 0).toFixed(1)}x`
  };
}
