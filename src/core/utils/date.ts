export function formatDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0')
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  const day = String(date.getUTCDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

export function toDate(value: Date | string): Date {
  return typeof value === 'string' ? new Date(`${value}T00:00:00Z`) : value
}
