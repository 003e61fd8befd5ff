import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { RawTransaction } from '../types/transaction';
import { IngestionError } from '../middleware/errorHandler';
import { parseDayFirstDate } from '../utils/dates';
import { logger } from '../config/logger';

export const REQUIRED_COLUMNS = [
    'trans_date_trans_time',
    'category',
    'amt',
    'lat',
    'long',
    'merch_lat',
    'merch_long',
    'dob',
    'is_fraud',
    'merchant'
] as const;

type RequiredColumn = typeof REQUIRED_COLUMNS[number];
type CsvRow = Record<string, string | undefined>;

export interface FieldWarning {
    row: number;
    column: RequiredColumn;
    value: string;
}

export interface IngestionResult {
    transactions: RawTransaction[];
    warnings: FieldWarning[];
}

const TRUE_LABELS = new Set(['1', 'true', 't', 'yes', 'y']);
const FALSE_LABELS = new Set(['0', 'false', 'f', 'no', 'n']);

export class IngestionService {

    async readFile(path: string): Promise<IngestionResult> {
        let text: string;
        try {
            text = await readFile(path, 'utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new IngestionError(`Unable to read transaction file ${path}: ${reason}`);
        }

        const result = this.parseCsv(text);
        logger.info('Transaction file ingested', {
            path,
            rows: result.transactions.length,
            warnings: result.warnings.length
        });
        return result;
    }

    parseCsv(text: string): IngestionResult {
        const parsed = Papa.parse<CsvRow>(text, {
            header: true,
            skipEmptyLines: true,
            transformHeader: header => header.trim()
        });

        const columns = parsed.meta.fields ?? [];
        const missing = REQUIRED_COLUMNS.filter(column => !columns.includes(column));
        if (missing.length > 0) {
            throw new IngestionError(`Missing required columns: ${missing.join(', ')}`, missing);
        }

        for (const parseError of parsed.errors) {
            logger.warn('CSV row irregularity', {
                row: parseError.row,
                code: parseError.code,
                message: parseError.message
            });
        }

        const warnings: FieldWarning[] = [];
        const transactions = parsed.data.map((row, index) => this.toRawTransaction(row, index, warnings));

        if (warnings.length > 0) {
            logger.warn(`${warnings.length} malformed field(s) coerced to null`, {
                firstRow: warnings[0].row,
                firstColumn: warnings[0].column
            });
        }

        return { transactions, warnings };
    }

    private toRawTransaction(row: CsvRow, index: number, warnings: FieldWarning[]): RawTransaction {
        const field = (column: RequiredColumn): string => (row[column] ?? '').trim();

        const note = <T>(column: RequiredColumn, value: T | null): T | null => {
            const text = field(column);
            if (value === null && text !== '') {
                warnings.push({ row: index, column, value: text });
            }
            return value;
        };

        return {
            transactionTime: note('trans_date_trans_time', parseDayFirstDate(field('trans_date_trans_time'))),
            category: field('category'),
            amount: note('amt', this.parseNumber(field('amt'))),
            cardholderLatitude: note('lat', this.parseNumber(field('lat'))),
            cardholderLongitude: note('long', this.parseNumber(field('long'))),
            merchantLatitude: note('merch_lat', this.parseNumber(field('merch_lat'))),
            merchantLongitude: note('merch_long', this.parseNumber(field('merch_long'))),
            dateOfBirth: note('dob', parseDayFirstDate(field('dob'))),
            isFraud: note('is_fraud', this.parseLabel(field('is_fraud'))),
            merchant: field('merchant')
        };
    }

    private parseNumber(text: string): number | null {
        if (text === '') {
            return null;
        }
        const value = Number(text);
        return Number.isFinite(value) ? value : null;
    }

    private parseLabel(text: string): boolean | null {
        const normalized = text.toLowerCase();
        if (TRUE_LABELS.has(normalized)) {
            return true;
        }
        if (FALSE_LABELS.has(normalized)) {
            return false;
        }
        return null;
    }
}
