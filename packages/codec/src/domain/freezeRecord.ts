/** Freezes a record and the map values nested in it. */
export function freezeRecord<T extends object>(record: T): Readonly<T> {
  for (const value of Object.values(record)) {
    if (typeof value === "object" && value !== null) Object.freeze(value);
  }
  return Object.freeze(record);
}
