export interface Slot {
  row: number; // 0-based grid row; row 0 is the header
  col: number; // 0-based grid column; column 0 holds the date
  label: string;
}

export type PathTaken = 'avaliacao_eligibilidade' | 'agendamento_direto';

export interface AuditRecord {
  timestamp: string; // ISO 8601 with offset
  caminho: PathTaken;
  elegivel: string;
  criterioPositivo: string;
  nomePaciente: string;
  prontuario: string;
  nomeCirurgiao: string;
  cirurgiaProposta: string;
  dataCirurgiaPrevista: string;
  observacoes: string;
  vaga: string;
  telegramUserId: string;
  telegramUsername: string;
}

export interface SlotStore {
  listOpenSlots(maxCount: number): Promise<Slot[]>;
  /** Claims an empty cell. Resolves false when the cell is already taken. */
  tryBook(row: number, col: number, text: string): Promise<boolean>;
}

export interface AuditLog {
  appendRecord(record: AuditRecord): Promise<void>;
}
