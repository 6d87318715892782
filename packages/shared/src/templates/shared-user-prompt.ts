/**
 * User prompt layout shared by every role template.
 */
export const USER_PROMPT_TEMPLATE = `Extract the operating statement figures from this {{role_name}} document.

DOCUMENT METADATA:
- filename: {{filename}}
- role: {{role_name}}

{{structure_guide}}
{{retry_instructions}}
DOCUMENT CONTENT:
{{content}}

Return ONLY the JSON object with every field of the schema. Use null for figures the document does not contain.`;
