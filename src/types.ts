export interface RawEvent {
  timestamp: string;
  duration: number; // seconds
  windowTitle: string;
}

export interface PageEvent {
  page: number;
  timestamp: string;
  duration: number;
  bookTitle: string;
  totalPages?: number;
}

export interface CleanedRecord {
  page: number;
  totalDuration: number;
  firstSeen: string;
  lastSeen: string;
}

export interface DeltaRecord {
  page: number;
  deltaDuration: number;
}

export interface PageRange {
  start: number;
  end: number;
}

export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface PageDuration {
  page: number;
  duration: number;
}

export interface AnalysisResult {
  bookTitle: string;
  pageRange: PageRange;
  pagesAnalyzed: number;
  totalDuration: number;
  avgDurationPerPage: number;
}

export type Snapshot =
  | { kind: "raw"; events: RawEvent[] }
  | { kind: "cleaned"; records: CleanedRecord[] };

export interface Config {
  apiUrl: string;
  eventLimit: number;
  viewerApp: string;
  outputDir: string;
  rawCsvFilename: string;
  cleanedCsvFilename: string;
  deltaCsvFilename: string;
}
