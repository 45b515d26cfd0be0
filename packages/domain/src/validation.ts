export interface FieldIssue {
  path: string;
  message: string;
}
