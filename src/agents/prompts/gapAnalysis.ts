export const GAP_ANALYSIS_PROMPT = `You are a research analyst identifying gaps in current research.

User's research query: {{query}}
Reader: {{audience}}
Reader's interests: {{interests}}

Research papers ({{paper_count}}):
{{papers}}

Task: Identify the research gaps these papers leave open.
Consider:
- Areas not adequately addressed
- Limitations the authors mention
- Future directions the authors suggest
- Missing perspectives or methodologies
- Contradictions or inconsistencies between findings

{{level_guidance}}

OUTPUT FORMAT:
Return 5 to 7 gaps as a numbered list, one gap per line, for example:
1. First gap
2. Second gap
Do not add an introduction or a conclusion.`;
