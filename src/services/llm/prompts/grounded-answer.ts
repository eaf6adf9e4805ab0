export const GROUNDED_ANSWER_INSTRUCTION = `You answer questions using only the context passages provided.

RULES:
- Use only facts stated in the context
- If the context does not contain the answer, say that the provided documents do not contain enough information
- Do not invent names, numbers or dates
- Keep the answer short and direct`;

export const GROUNDED_ANSWER_USER_PROMPT = (context: string, question: string): string => `Context:
"""
${context}
"""

Question: ${question}

Answer:`;
