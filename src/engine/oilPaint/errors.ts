export type OilSimulatorErrorCode = 'invalid_input' | 'canvas_unavailable';

export class OilSimulatorError extends Error {
  readonly code: OilSimulatorErrorCode;

  constructor(code: OilSimulatorErrorCode, scope: string, message: string) {
    super(`[${scope}] ${message}`);
    this.name = 'OilSimulatorError';
    this.code = code;
  }
}

export function invalidInput(scope: string, message: string): OilSimulatorError {
  return new OilSimulatorError('invalid_input', scope, message);
}

export function canvasUnavailable(scope: string, message: string): OilSimulatorError {
  return new OilSimulatorError('canvas_unavailable', scope, message);
}

export function isOilSimulatorError(
  error: unknown,
  code?: OilSimulatorErrorCode
): error is OilSimulatorError {
  if (!(error instanceof OilSimulatorError)) return false;
  return code === undefined || error.code === code;
}
