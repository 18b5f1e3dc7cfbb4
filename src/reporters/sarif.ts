import type { AnalyzerMeta } from '../core/analyzer';
import type { AnalysisIssue, AnalysisResult, AnalyzerCategory, Severity } from '../types';

interface SarifLocation {
  physicalLocation: {
    artifactLocation: {
      uri: string;
    };
    region: {
      startLine: number;
      endLine?: number;
      snippet?: { text: string };
    };
  };
}

interface SarifResult {
  ruleId: string;
  level: 'error' | 'warning' | 'note';
  message: {
    text: string;
  };
  locations: SarifLocation[];
  partialFingerprints: Record<string, string>;
  properties: {
    category: AnalyzerCategory;
    severity: Severity;
    code: string;
    recommendation: string;
  };
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: {
    text: string;
  };
  fullDescription: {
    text: string;
  };
  helpUri?: string;
  defaultConfiguration: {
    level: 'error' | 'warning' | 'note';
  };
  properties: {
    category: AnalyzerCategory;
    tags: string[];
  };
}

interface SarifDocument {
  $schema: string;
  version: '2.1.0';
  runs: Array<{
    tool: {
      driver: {
        name: string;
        version: string;
        rules: SarifRule[];
      };
    };
    artifacts: Array<{
      location: {
        uri: string;
      };
    }>;
    results: SarifResult[];
  }>;
}

export function sarifLevelForSeverity(severity: Severity): 'error' | 'warning' | 'note' {
  if (severity === 'critical' || severity === 'high') return 'error';
  if (severity === 'medium') return 'warning';
  return 'note';
}

function toRule(meta: AnalyzerMeta): SarifRule {
  return {
    id: meta.id,
    name: meta.name,
    shortDescription: { text: meta.name },
    fullDescription: { text: meta.description },
    helpUri: meta.docsUrl,
    defaultConfiguration: { level: sarifLevelForSeverity(meta.severity) },
    properties: { category: meta.category, tags: meta.tags },
  };
}

function toLocation(issue: AnalysisIssue): SarifLocation {
  const { file, line, endLine } = issue.location;
  return {
    physicalLocation: {
      artifactLocation: { uri: file },
      region: {
        startLine: Math.max(line, 1),
        endLine: endLine !== undefined && endLine >= line ? endLine : undefined,
        snippet: issue.snippet ? { text: issue.snippet } : undefined,
      },
    },
  };
}

export class SarifReporter {
  /** `rules` supplies rule metadata; issues from unknown rules get a minimal entry. */
  constructor(private readonly rules: readonly AnalyzerMeta[] = []) {}

  toSarif(result: AnalysisResult): string {
    const known = new Map(this.rules.map((meta) => [meta.id, meta]));
    const rulesById = new Map<string, SarifRule>();
    const artifacts = new Set<string>();

    const sarifResults: SarifResult[] = result.issues.map((issue) => {
      if (!rulesById.has(issue.ruleId)) {
        const meta = known.get(issue.ruleId);
        rulesById.set(
          issue.ruleId,
          meta
            ? toRule(meta)
            : {
                id: issue.ruleId,
                name: issue.ruleId,
                shortDescription: { text: issue.ruleId },
                fullDescription: { text: issue.recommendation || issue.message },
                defaultConfiguration: { level: sarifLevelForSeverity(issue.severity) },
                properties: { category: issue.category, tags: [] },
              },
        );
      }
      artifacts.add(issue.location.file);

      return {
        ruleId: issue.ruleId,
        level: sarifLevelForSeverity(issue.severity),
        message: { text: issue.message },
        locations: [toLocation(issue)],
        partialFingerprints: { primaryLocationLineHash: issue.fingerprint },
        properties: {
          category: issue.category,
          severity: issue.severity,
          code: issue.code,
          recommendation: issue.recommendation,
        },
      };
    });

    const sarif: SarifDocument = {
      $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
      version: '2.1.0',
      runs: [
        {
          tool: {
            driver: {
              name: 'laravel-lint',
              version: result.toolVersion,
              rules: Array.from(rulesById.values()).sort((a, b) => a.id.localeCompare(b.id)),
            },
          },
          artifacts: Array.from(artifacts)
            .sort()
            .map((uri) => ({ location: { uri } })),
          results: sarifResults,
        },
      ],
    };

    return JSON.stringify(sarif, null, 2);
  }
}
