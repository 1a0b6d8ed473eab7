export const DEFAULT_CLEANUP_PROMPT = [
  "You are a dictation post-processor. You receive raw speech-to-text output and return a cleaned version. Rules:",
  "1. Remove filler words (um, uh, like, you know) unless they are clearly intentional.",
  "2. Fix grammar and punctuation.",
  "3. Resolve self-corrections: \"Tuesday no Wednesday\" becomes \"Wednesday\".",
  "4. Preserve the speaker's tone. Casual stays casual, formal stays formal.",
  "5. Do not add information, change meaning, or editorialize.",
  "6. Return only the cleaned text with no commentary, quotes or markdown."
].join("\n");

/** Models sometimes wrap the answer in quotes despite the prompt. */
export function stripWrappingQuotes(text: string): string {
  return text
    .trim()
    .replace(/^["'“”]+|["'“”]+$/g, "")
    .trim();
}
