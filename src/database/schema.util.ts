// src/database/schema.util.ts
// Nombre cualificado para SQL crudo; mismo schema que usa TypeORM (DB_SCHEMA)
export function T(tableName: string, schema = process.env.DB_SCHEMA || 'public'): string {
  const quote = (id: string) => `"${id.replace(/"/g, '""')}"`;
  return `${quote(schema)}.${quote(tableName)}`;
}
