// src/services/google-sheets-service.ts
import { google, sheets_v4 } from 'googleapis';
import type { AppConfig } from '@/lib/config';
import { cellReference, findOpenSlots, quoteSheet, type GridCell } from '@/lib/slot-grid';
import { isFilledCell, isValidGridRow, isValidSlotColumn } from '@/lib/validators';
import type { AuditLog, AuditRecord, Slot, SlotStore } from '@/types/booking';

let sheets: sheets_v4.Sheets | null = null;

function getSheetsClient(config: AppConfig): sheets_v4.Sheets {
  if (sheets) {
    return sheets;
  }
  const auth = new google.auth.GoogleAuth({
    credentials: {
      client_email: config.GOOGLE_SHEETS_SERVICE_ACCOUNT_CLIENT_EMAIL,
      private_key: config.GOOGLE_SHEETS_SERVICE_ACCOUNT_PRIVATE_KEY,
    },
    scopes: ['https://www.googleapis.com/auth/spreadsheets'],
  });

  sheets = google.sheets({ version: 'v4', auth });
  return sheets;
}

/** The three value calls the stores make, bound to one spreadsheet. */
export interface SheetValuesApi {
  get(range: string): Promise<GridCell[][]>;
  update(range: string, values: string[][], valueInputOption: 'RAW' | 'USER_ENTERED'): Promise<void>;
  /** Resolves to the range the appended row landed in, when the API reports it. */
  append(range: string, values: string[][]): Promise<string | undefined>;
}

export function googleSheetValues(client: sheets_v4.Sheets, spreadsheetId: string): SheetValuesApi {
  return {
    async get(range) {
      const response = await client.spreadsheets.values.get({ spreadsheetId, range });
      return response.data.values ?? [];
    },
    async update(range, values, valueInputOption) {
      await client.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption,
        requestBody: { values },
      });
    },
    async append(range, values) {
      const response = await client.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
      return response.data.updates?.updatedRange ?? undefined;
    },
  };
}

export const AUDIT_HEADER_ROW = [
  'timestamp',
  'caminho',
  'elegivel',
  'criterio_positivo',
  'nome_paciente',
  'prontuario',
  'nome_cirurgiao',
  'cirurgia_proposta',
  'data_cirurgia_prevista',
  'observacoes',
  'vaga',
  'telegram_user_id',
  'telegram_username',
] as const;

// USER_ENTERED would evaluate text starting with these as a formula.
function asLiteralText(value: string): string {
  return /^[=+\-@]/.test(value) ? `'${value}` : value;
}

/**
 * Orders an audit record into the log sheet's fixed column layout.
 */
export function auditRow(record: AuditRecord): string[] {
  return [
    record.timestamp,
    record.caminho,
    record.elegivel,
    record.criterioPositivo,
    asLiteralText(record.nomePaciente),
    asLiteralText(record.prontuario),
    asLiteralText(record.nomeCirurgiao),
    asLiteralText(record.cirurgiaProposta),
    asLiteralText(record.dataCirurgiaPrevista),
    asLiteralText(record.observacoes),
    asLiteralText(record.vaga),
    record.telegramUserId,
    asLiteralText(record.telegramUsername),
  ];
}

export class GoogleSheetsSlotStore implements SlotStore {
  constructor(
    private readonly values: SheetValuesApi,
    private readonly sheetName: string
  ) {}

  /**
   * Reads the slot sheet and returns up to `maxCount` empty cells, row by row.
   */
  async listOpenSlots(maxCount: number): Promise<Slot[]> {
    try {
      const grid = await this.values.get(quoteSheet(this.sheetName));
      const slots = findOpenSlots(grid, maxCount);
      console.log(`[Google Sheets Service] Found ${slots.length} open slots (limit ${maxCount}).`);
      return slots;
    } catch (error) {
      console.error('[Google Sheets Service] Error reading slot grid:', error);
      throw error;
    }
  }

  /**
   * Re-reads one cell and writes the booking only if it is still empty.
   * Two bookings racing between the read and the write are not detected here;
   * exclusivity is as strong as the sheet's own ordering of writes.
   * @returns false when the cell is already filled.
   */
  async tryBook(row: number, col: number, text: string): Promise<boolean> {
    if (!isValidGridRow(row) || !isValidSlotColumn(col)) {
      console.warn(`[Google Sheets Service] Refusing to book header or date cell (${row}, ${col}).`);
      return false;
    }
    const range = cellReference(this.sheetName, row, col);
    try {
      const current = await this.values.get(range);
      const value = current[0]?.[0];
      if (isFilledCell(value)) {
        console.warn(`[Google Sheets Service] Cell ${range} already taken.`);
        return false;
      }

      await this.values.update(range, [[text]], 'RAW');
      console.log(`[Google Sheets Service] Booked cell ${range}.`);
      return true;
    } catch (error) {
      console.error(`[Google Sheets Service] Error booking cell ${range}:`, error);
      throw error;
    }
  }
}

export class GoogleSheetsAuditLog implements AuditLog {
  private headerChecked = false;

  constructor(
    private readonly values: SheetValuesApi,
    private readonly sheetName: string
  ) {}

  /**
   * Writes the header row into an empty log sheet. An existing first row is left alone.
   */
  private async ensureHeader(): Promise<void> {
    if (this.headerChecked) return;
    const sheet = quoteSheet(this.sheetName);
    const headerRows = await this.values.get(`${sheet}!A1:M1`);
    const firstRow = headerRows[0] ?? [];

    if (firstRow.length === 0) {
      console.log(`[Google Sheets Service] Log sheet "${this.sheetName}" is empty, writing header row.`);
      await this.values.update(`${sheet}!A1`, [[...AUDIT_HEADER_ROW]], 'RAW');
    } else if (JSON.stringify(firstRow) !== JSON.stringify(AUDIT_HEADER_ROW)) {
      console.warn(`[Google Sheets Service] Log sheet "${this.sheetName}" has an unexpected header row:`, firstRow);
    }
    this.headerChecked = true;
  }

  /**
   * Appends one audit row. Failures are re-thrown and never retried.
   */
  async appendRecord(record: AuditRecord): Promise<void> {
    try {
      await this.ensureHeader();
      const updatedRange = await this.values.append(`${quoteSheet(this.sheetName)}!A:M`, [auditRow(record)]);
      console.log('[Google Sheets Service] Audit record appended:', updatedRange);
    } catch (error) {
      console.error('[Google Sheets Service] Error appending audit record:', error);
      throw error;
    }
  }
}

export function createGoogleSheetsAdapters(config: AppConfig): { slotStore: SlotStore; auditLog: AuditLog } {
  const values = googleSheetValues(getSheetsClient(config), config.GOOGLE_SHEET_ID);
  return {
    slotStore: new GoogleSheetsSlotStore(values, config.SLOTS_SHEET_NAME),
    auditLog: new GoogleSheetsAuditLog(values, config.LOG_SHEET_NAME),
  };
}
