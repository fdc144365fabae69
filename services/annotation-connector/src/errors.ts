export class ConnectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedMessageError extends ConnectorError {}

export class JobStateUpdateError extends ConnectorError {}

export class InferenceRequestError extends ConnectorError {
  public readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class InferenceResponseError extends ConnectorError {}

export class MissingTargetIdentifierError extends ConnectorError {}

export class PublishError extends ConnectorError {}

export class DigitalObjectRequestError extends ConnectorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
