export interface BindingIssue {
  key: string;
  message: string;
}

/**
 * Configuration values that could not be converted onto a data source
 */
export class DataSourceBindingError extends Error {
  constructor(
    public readonly target: string,
    public readonly issues: BindingIssue[],
  ) {
    const issueList = issues
      .map((issue) => `  - ${issue.key}: ${issue.message}`)
      .join('\n');
    super(`Failed to bind properties to data source '${target}':\n${issueList}`);
    this.name = 'DataSourceBindingError';
  }
}

/**
 * Conflicting or invalid data source names and aliases
 */
export class DataSourceDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataSourceDefinitionError';
  }
}
