import type { AnalysisResult } from '../types';
import { TOOL_VERSION } from '../core/version';

interface JsonReportEnvelope {
  schemaVersion: string;
  generatedAt: string;
  result: AnalysisResult;
}

export class JsonReporter {
  toJson(result: AnalysisResult): string {
    const envelope: JsonReportEnvelope = {
      schemaVersion: TOOL_VERSION,
      generatedAt: new Date().toISOString(),
      result,
    };

    return JSON.stringify(envelope, null, 2);
  }
}
