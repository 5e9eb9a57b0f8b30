export function toSnakeCase(value: string): string {
  return value
    .trim()
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

export function capitalize(value: string): string {
  const first = value[0];
  return first ? first.toUpperCase() + value.slice(1) : value;
}

export function normalizeSource(content: string): string {
  return content.replace(/\r\n/g, "\n").trimEnd() + "\n";
}
