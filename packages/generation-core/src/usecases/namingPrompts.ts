export const NAMING_SYSTEM_PROMPT = `
あなたは名前を考えるアシスタントです。
ユーザーが示した条件に合う名前の候補を考え、候補だけを改行区切りで返してください。
前置きや説明文、番号や記号は付けないでください。
`.trim();

export function buildNamingPrompt(condition: string): string {
  return `
次の条件に合う名前を考えてください。

条件:
${condition}
`.trim();
}
