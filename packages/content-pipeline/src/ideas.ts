const LIST_ITEM = /^[0-9*-]/;
const LIST_MARKER = /^[0-9.*\- ]+/;

/**
 * Pull list items ("1. x", "- x", "* x") out of a model response.
 */
export function parseIdeas(response: string, count: number): string[] {
  const ideas: string[] = [];

  for (const raw of response.split("\n")) {
    const line = raw.trim();
    if (!LIST_ITEM.test(line)) continue;

    const idea = line.replace(LIST_MARKER, "").trim();
    if (idea) ideas.push(idea);
  }

  return ideas.slice(0, count);
}
