import { Position } from '../parser/tokens';
import { createLogger } from './logger';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  file?: string;
  position?: Position | null;
}

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const parts: string[] = [];
  parts.push(`[${level || 'WARN'}]`);
  parts.push(`[${component || 'unknown'}]`);
  parts.push(message);
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (meta.position) {
      fields.push(`line=${meta.position.line}`);
      fields.push(`column=${meta.position.column}`);
    }
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}
