export const EXPLANATION_PROMPT = `You are an educator explaining research findings.

User's research query: {{query}}
Target audience: {{audience}}
Audience's interests: {{interests}}

Research papers ({{paper_count}}):
{{papers}}

Task: Explain what these papers found in a way that {{audience}} can follow.

{{level_guidance}}

Guidelines:
- Include an example or analogy where it helps
- Focus on practical implications and real-world applications
- Keep it engaging and accurate

Respond with the explanation only, 200 to 300 words.`;
