/**
 * Role Extraction Template Types
 */

import type { DocumentRole } from '../types';

/**
 * Extraction template for one document role. Each template tells the model
 * which figures the document carries and how to treat them.
 */
export interface RoleTemplate {
  documentRole: DocumentRole;

  /** Role-specific rules appended to the shared system prompt */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{filename}}: The original filename
   * - {{role_name}}: Human-readable role
   * - {{structure_guide}}: How to read the content markers
   * - {{content}}: The canonical document text
   * - {{retry_instructions}}: Escalation block for retry attempts (may be empty)
   */
  userPromptTemplate: string;

  description: string;
}
