export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly line?: number;
  readonly suggestion?: string;
}

export function hasErrorDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  const seen = new Set<string>();
  const deduped: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const key = [
      diagnostic.code,
      diagnostic.path,
      diagnostic.severity,
      diagnostic.message,
      diagnostic.line ?? '',
    ].join('\u001f');
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    deduped.push(diagnostic);
  }

  return deduped;
}

export function capDiagnostics(
  diagnostics: readonly Diagnostic[],
  maxDiagnosticCount: number,
): readonly Diagnostic[] {
  if (!Number.isInteger(maxDiagnosticCount) || maxDiagnosticCount < 0) {
    throw new Error('maxDiagnosticCount must be an integer >= 0.');
  }

  if (diagnostics.length <= maxDiagnosticCount) {
    return [...diagnostics];
  }

  return diagnostics.slice(0, maxDiagnosticCount);
}
