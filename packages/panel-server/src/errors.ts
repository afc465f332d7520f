export type PanelErrorCode =
  | 'missing_surface'
  | 'duplicate_instance'
  | 'unknown_instance'
  | 'invalid_config'
  | 'config_not_found';

export class PanelError extends Error {
  code: PanelErrorCode;

  constructor(code: PanelErrorCode, message: string) {
    super(message);
    this.name = 'PanelError';
    this.code = code;
  }
}

export function isPanelError(err: unknown, code?: PanelErrorCode): err is PanelError {
  return err instanceof PanelError && (code === undefined || err.code === code);
}
