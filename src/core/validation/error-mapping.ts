/**
 * Turns zod validation issues into messages an operator can act on
 */

import { ZodError, ZodIssue } from 'zod'

export interface FriendlyError {
  field: string;
  message: string;
  suggestion?: string;
}

const FIELD_SUGGESTIONS: Record<string, string> = {
  'sourceAddress': 'Use "auto", an address like "203.0.113.7" or a block like "203.0.113.0/24"',
  'adminUsername': 'Use lowercase letters, digits, "-" or "_", max 32 chars, not a reserved name like "admin" or "root"',
  'location': 'Use an Azure location short name like "westeurope" or "eastus"',
  'resourceGroupName': 'Use up to 90 letters, digits, "-", "_", "(", ")" or "." (not ending with ".")',
  'vmName': 'Use up to 64 letters, digits or "-", not starting or ending with "-"',
  'subscriptionId': 'Provide a subscription UUID like "00000000-0000-0000-0000-000000000000"',
  'auth.type': 'Use "ssh" or "password"',
}

export function mapValidationError(error: ZodError): FriendlyError[] {
  return error.issues.map(mapSingleIssue);
}

function mapSingleIssue(issue: ZodIssue): FriendlyError {
  const field = issue.path.join('.');
  const suggestion = FIELD_SUGGESTIONS[field];

  switch (issue.code) {
    case 'invalid_type':
      return {
        field,
        message: issue.received === 'undefined' ? 'Required value is missing' : `Expected ${issue.expected}, received ${issue.received}`,
        suggestion,
      };

    case 'unrecognized_keys':
      return {
        field: field || '(root)',
        message: `Unknown option(s): ${issue.keys.join(', ')}`,
      };

    case 'custom':
      // Refinements sharing a field can carry their own suggestion
      return {
        field,
        message: issue.message,
        suggestion: typeof issue.params?.suggestion === 'string' ? issue.params.suggestion : suggestion,
      };

    default:
      return {
        field,
        message: issue.message,
        suggestion,
      };
  }
}

export function formatErrorsForCLI(errors: FriendlyError[]): string {
  const lines: string[] = ['Invalid configuration:'];

  for (const error of errors) {
    lines.push(`  - ${error.field}: ${error.message}`);
    if (error.suggestion) {
      lines.push(`    ${error.suggestion}`);
    }
  }

  return lines.join('\n');
}
