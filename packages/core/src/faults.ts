export interface CellPosition {
  x: number;
  y: number;
}

export type RouteFault =
  | {
      kind: 'boundary';
      coordinate: CellPosition;
      width: number;
      height: number;
    }
  | {
      kind: 'configuration';
      subject: string;
      detail: string;
      code?: string;
    };

export type RouteFaultKind = RouteFault['kind'];

export function describeFault(fault: RouteFault): string {
  switch (fault.kind) {
    case 'boundary':
      return `Cell (${fault.coordinate.x}, ${fault.coordinate.y}) is outside the ${fault.width}x${fault.height} grid`;
    case 'configuration':
      return fault.code === undefined
        ? `Invalid ${fault.subject}: ${fault.detail}`
        : `Invalid ${fault.subject} '${fault.code}': ${fault.detail}`;
    default:
      return assertNever(fault);
  }
}

export class RouteFaultError extends Error {
  readonly fault: RouteFault;

  constructor(fault: RouteFault) {
    super(describeFault(fault));
    this.name = 'RouteFaultError';
    this.fault = fault;
  }
}

export function boundaryFault(coordinate: CellPosition, width: number, height: number): RouteFaultError {
  return new RouteFaultError({
    kind: 'boundary',
    coordinate: { x: coordinate.x, y: coordinate.y },
    width,
    height
  });
}

export function configurationFault(subject: string, detail: string, code?: string): RouteFaultError {
  return new RouteFaultError(
    code === undefined ? { kind: 'configuration', subject, detail } : { kind: 'configuration', subject, detail, code }
  );
}

export function isRouteFault(error: unknown, kind?: RouteFaultKind): error is RouteFaultError {
  if (!(error instanceof RouteFaultError)) return false;
  return kind === undefined || error.fault.kind === kind;
}

/**
 * Compile-time exhaustive check for discriminated unions.
 * Use as the default case in switch statements.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
