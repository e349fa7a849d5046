export type IssueCode = 'invalid' | 'not-found' | 'exception';

export class CodingError extends Error {
  readonly status: number;
  readonly issueCode: IssueCode;

  constructor(message: string, status: number, issueCode: IssueCode) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.issueCode = issueCode;
  }
}

export class InvalidQueryError extends CodingError {
  constructor(message = 'No disease provided') {
    super(message, 400, 'invalid');
  }
}

export class NotFoundError extends CodingError {
  readonly diseaseName: string;

  constructor(diseaseName: string) {
    super('Disease not found', 404, 'not-found');
    this.diseaseName = diseaseName;
  }
}

// Same shape as zod's safeParse result so callers branch on `success` either way.
export type Result<T, E extends Error = CodingError> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T>(data: T): { success: true; data: T } => ({ success: true, data });

export const fail = <E extends Error>(error: E): { success: false; error: E } => ({ success: false, error });
