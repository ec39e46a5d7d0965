export type ErrorCode = 'PROFILE_NOT_FOUND' | 'PROFILE_PARSE_ERROR';

export class DotlinkError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DotlinkError';
    this.code = code;
  }
}

export class ProfileNotFoundError extends DotlinkError {
  readonly profilePath: string;

  constructor(profilePath: string) {
    super('PROFILE_NOT_FOUND', `Profile not found: ${profilePath}`);
    this.name = 'ProfileNotFoundError';
    this.profilePath = profilePath;
  }
}

export class ProfileParseError extends DotlinkError {
  readonly profilePath: string;
  readonly issues: string[];

  constructor(profilePath: string, issues: string[], options?: { cause?: unknown }) {
    super('PROFILE_PARSE_ERROR', `Invalid profile ${profilePath}: ${issues.join('; ')}`, options);
    this.name = 'ProfileParseError';
    this.profilePath = profilePath;
    this.issues = issues;
  }
}
