import path from 'path';
import { parsePromptRecord } from '../../core/entities/PromptRecord.js';
import { JobFileError } from '../../core/errors.js';
import { Issue, fatal } from '../../core/interfaces/IBackendAdapter.js';
import { IBackendRegistry } from '../../core/interfaces/IBackendRegistry.js';
import { EnvironmentReport } from '../../infrastructure/backends/BackendRegistry.js';
import { JOB_FILE_EXTENSION, readNumberedLines } from '../../infrastructure/files/jobFiles.js';

export interface LineIssues {
  lineNumber: number;
  issues: Issue[];
}

export interface CheckReport {
  filePath: string;
  valid: boolean;
  lines: LineIssues[];
  environment: EnvironmentReport[]; // only the backends the file uses
}

/**
 * Validate a job file without sending anything: every line must parse into a record
 * naming a known backend whose prompt-shape check passes, and the backends used must be
 * configured. Advisory issues are reported but do not make the file invalid.
 */
export async function checkJobFile(
  filePath: string,
  registry: IBackendRegistry,
  environment: EnvironmentReport[]
): Promise<CheckReport> {
  const fileName = path.basename(filePath);
  const lines: LineIssues[] = [];
  const usedApis = new Set<string>();

  if (path.extname(filePath) !== JOB_FILE_EXTENSION) {
    lines.push({ lineNumber: 0, issues: [fatal(`job files must have the ${JOB_FILE_EXTENSION} extension`)] });
  }

  for (const line of await readNumberedLines(filePath)) {
    const issues: Issue[] = [];
    try {
      const record = parsePromptRecord(line.text, line.lineNumber, fileName);
      if (!record.api) {
        issues.push(fatal("'api' key not found"));
      } else {
        const lookup = registry.lookup(record.api);
        if (lookup.status === 'unknown') {
          issues.push(fatal(`'${record.api}' is not a known api (known: ${registry.apiNames().join(', ')})`));
        } else {
          usedApis.add(record.api);
          issues.push(...lookup.adapter.checkPromptShape(record));
        }
      }
    } catch (error) {
      if (!(error instanceof JobFileError)) throw error;
      issues.push(fatal(error.reason));
    }

    if (issues.length > 0) {
      lines.push({ lineNumber: line.lineNumber, issues });
    }
  }

  const usedEnvironment = environment.filter((report) => usedApis.has(report.apiName) && report.issues.length > 0);
  const hasFatal = (issues: Issue[]) => issues.some((issue) => issue.severity === 'fatal');

  return {
    filePath,
    valid: !lines.some((line) => hasFatal(line.issues)) && !usedEnvironment.some((report) => hasFatal(report.issues)),
    lines,
    environment: usedEnvironment,
  };
}

/**
 * Report as log lines, one per problem line plus one per backend with environment issues
 */
export function formatCheckReport(report: CheckReport): string[] {
  const describe = (issues: Issue[]) =>
    issues.map((issue) => `${issue.severity === 'fatal' ? 'error' : 'warning'}: ${issue.message}`).join('; ');

  const output = report.lines.map((line) =>
    line.lineNumber === 0
      ? `File ${report.filePath}: ${describe(line.issues)}`
      : `Line ${line.lineNumber} has the following issues: ${describe(line.issues)}`
  );
  for (const backend of report.environment) {
    output.push(`Environment for ${backend.apiName}: ${describe(backend.issues)}`);
  }
  output.push(
    report.valid
      ? `File ${report.filePath} is a valid job file${output.length > 0 ? ', but check the warnings above' : ''}`
      : `File ${report.filePath} is an invalid job file`
  );
  return output;
}
