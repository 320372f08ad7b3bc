import { z } from 'zod';
import { RULE_IDS } from '../diagnostic.js';

const ruleSettingSchema = z.enum(['error', 'warn', 'off']);

/**
 * 設定ファイルのスキーマ
 * すべてのキーは省略可能で、省略時はDEFAULT_CONFIGの値を使う
 */
const configFileSchema = z.object({
  version: z.string().optional(),
  project: z
    .object({
      name: z.string().optional(),
      root: z.string().optional(),
    })
    .optional(),
  files: z
    .object({
      include: z.array(z.string()).optional(),
      exclude: z.array(z.string()).optional(),
      ignoreGitignore: z.boolean().optional(),
    })
    .optional(),
  rules: z.record(z.enum(RULE_IDS), ruleSettingSchema).optional(),
  codeBlocks: z
    .object({
      requireLanguage: z.boolean().optional(),
      extraLanguages: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  assets: z
    .object({
      publicDirs: z.array(z.string()).min(1).optional(),
    })
    .optional(),
  watcher: z
    .object({
      debounceMs: z.number().nonnegative().optional(),
    })
    .optional(),
});

/** 検証済みの設定ファイル内容（デフォルト値とのマージ前） */
export type DocAuditConfigFile = z.infer<typeof configFileSchema>;

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): DocAuditConfigFile {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new Error('Config must be an object');
  }

  const result = configFileSchema.safeParse(config);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new Error(`config.${issue.path.join('.')}: ${issue.message}`);
  }

  return result.data;
}
