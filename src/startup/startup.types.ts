export interface ValidationReport {
  ok: boolean;
  errors: string[];
  warnings: string[];
}
