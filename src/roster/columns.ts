export type ColumnRole = 'name' | 'email' | 'due_date';

export const REQUIRED_COLUMNS: readonly ColumnRole[] = ['name', 'email', 'due_date'];

// Header text (after normalizeHeader) accepted for each role
const SYNONYMS: Record<ColumnRole, readonly string[]> = {
  name: ['name', 'student', 'student_name', 'full_name', 'nombre'],
  email: ['email', 'e_mail', 'mail', 'email_address', 'correo'],
  due_date: ['due_date', 'due', 'deadline', 'vencimiento', 'fecha_limite'],
};

export function normalizeHeader(header: unknown): string {
  return String(header ?? '')
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
}

export function roleOf(normalized: string): ColumnRole | undefined {
  return REQUIRED_COLUMNS.find((role) => SYNONYMS[role].includes(normalized));
}

/**
 * Map each required role to the index of the first header that names it.
 * Returns the roles that could not be found alongside the mapping.
 */
export function resolveColumns(headers: unknown[]): {
  indexes: Partial<Record<ColumnRole, number>>;
  normalized: string[];
  missing: ColumnRole[];
} {
  const normalized = headers.map(normalizeHeader);
  const indexes: Partial<Record<ColumnRole, number>> = {};

  normalized.forEach((header, index) => {
    const role = roleOf(header);
    if (role && indexes[role] === undefined) {
      indexes[role] = index;
    }
  });

  const missing = REQUIRED_COLUMNS.filter((role) => indexes[role] === undefined);
  return { indexes, normalized, missing };
}
