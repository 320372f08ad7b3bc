/**
 * 脚注の参照と定義の対応
 */

import type { DocumentRule, RuleFinding } from './types.js';

export const footnotesRule: DocumentRule = {
  id: 'footnotes',
  title: 'Footnotes are defined and referenced',
  description: '脚注参照に対応する定義があり、定義が重複せず、未参照の定義がない',
  scope: 'document',
  check: (document) => {
    const { footnoteReferences, footnoteDefinitions } = document.outline;
    const findings: RuleFinding[] = [];

    const definedAt = new Map<string, number>();
    for (const definition of footnoteDefinitions) {
      if (definedAt.has(definition.label)) {
        findings.push({
          path: document.path,
          line: definition.line,
          message: `footnote [^${definition.label}] is defined more than once`,
        });
        continue;
      }
      definedAt.set(definition.label, definition.line);
    }

    // 未定義の参照は最初の出現箇所で1回だけ報告
    const referenced = new Set<string>();
    for (const reference of footnoteReferences) {
      if (referenced.has(reference.label)) {
        continue;
      }
      referenced.add(reference.label);

      if (!definedAt.has(reference.label)) {
        findings.push({
          path: document.path,
          line: reference.line,
          message: `footnote [^${reference.label}] has no definition`,
        });
      }
    }

    for (const [label, line] of definedAt) {
      if (!referenced.has(label)) {
        findings.push({
          path: document.path,
          line,
          message: `footnote [^${label}] is defined but never referenced`,
        });
      }
    }

    return findings;
  },
};
