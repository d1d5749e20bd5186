/** 脚本校验问题的统一表示（CLI 读入脚本时使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / INVALID_JSON）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/inputs/2/col"）。 */
  path: string;
  /** 人类可读消息（面向脚本作者/日志）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}
