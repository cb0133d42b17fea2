const FENCED_BLOCK = /```[\w+-]*[^\S\n]*\n([\s\S]*?)```/;

/**
 * Pull program source out of a model completion.
 *
 * Models often wrap code in markdown fences and add prose around it. When a
 * fenced block is present its body is the artifact; otherwise stray fence
 * markers are removed and the remaining text is used as is.
 */
export function extractArtifactSource(completion: string): string {
  const match = FENCED_BLOCK.exec(completion);
  if (match) {
    return match[1].trim();
  }
  return completion.replace(/^```(?:javascript|js)?|```$/gm, "").trim();
}
