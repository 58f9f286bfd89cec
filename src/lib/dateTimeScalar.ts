import { GraphQLScalarType, Kind } from 'graphql';

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const d = new Date(value);
  return isNaN(d.getTime()) ? null : d;
}

export const DateTime = new GraphQLScalarType<Date | null, string | null>({
  name: 'DateTime',
  description: 'ISO 8601 date-time string',
  serialize(value) {
    return toDate(value)?.toISOString() ?? null;
  },
  parseValue(value) {
    return toDate(value);
  },
  parseLiteral(ast) {
    if (ast.kind !== Kind.STRING) return null;
    return toDate(ast.value);
  },
});
