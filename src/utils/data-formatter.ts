import Decimal from 'decimal.js';

export class DataFormatter {
    /** `$25,000`, `$1,234.50`, `-$300`; cents only when there are any. */
    formatCurrency(amount: Decimal): string {
      const sign = amount.isNegative() && !amount.isZero() ? '-' : '';
      const [whole, cents] = amount.abs().toFixed(2).split('.');
      const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
      return `${sign}$${grouped}${cents === '00' ? '' : `.${cents}`}`;
    }

    formatDate(date: string | null | undefined): string {
      if (!date) return 'N/A';
      return date.length >= 10 ? date.substring(0, 10) : date;
    }

    isoDate(date: Date): string {
      return date.toISOString().substring(0, 10);
    }

    truncateText(text: string, maxLength: number = 100): string {
      if (!text || text.length <= maxLength) return text;
      return text.substring(0, maxLength - 3) + '...';
    }

    sanitizeForMarkdown(text: string): string {
      return text
        .replace(/([_*`\[])/g, '\\$1')
        .replace(/\s+/g, ' ')
        .trim();
    }

    slugify(text: string): string {
      const slug = text
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
      return slug || 'client';
    }

    plural(count: number, noun: string): string {
      return `${count} ${noun}${count === 1 ? '' : 's'}`;
    }
  }

  export const dataFormatter = new DataFormatter();
