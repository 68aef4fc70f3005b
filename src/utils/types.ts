export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Location {
  start: Position;
  end: Position;
}

export const defaultLocation: Location = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

type LooseLocation =
  | {
      start: { line: number; column: number; offset?: number };
      end: { line: number; column: number; offset?: number };
    }
  | undefined;

/** Accepts peggy ranges and partially filled locations alike. */
export const toLocation = (location?: LooseLocation): Location => {
  if (!location) return defaultLocation;
  return {
    start: {
      line: location.start.line,
      column: location.start.column,
      offset: location.start.offset ?? 0,
    },
    end: {
      line: location.end.line,
      column: location.end.column,
      offset: location.end.offset ?? 0,
    },
  };
};

export function compareLocations(a: Location, b: Location): number {
  return a.start.offset - b.start.offset || a.end.offset - b.end.offset;
}
