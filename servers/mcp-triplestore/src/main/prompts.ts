export const SYSTEM_PROMPT = `You are interacting with a fact store that holds subject-predicate-object triples such as "alice likes cake".

QUERY SYNTAX:
- A clause is three tokens: id, predicate, object. Wrap a value containing spaces in quotes: alice likes "chocolate cake".
- A token starting with ? is a variable: ?who likes cake.
- Join clauses with " . " (space, dot, space) to ask for answers that satisfy all of them: ?who likes ?what . ?what is sweet.
- Values are case-insensitive and stored in lowercase.

TOOL USAGE WORKFLOW:
1. Use \`add_fact\` to record a single concrete fact. Facts cannot contain variables.
2. Use \`query_facts\` to find bindings for the variables of a query.
3. Use \`remove_facts\` to delete every fact a query matches. A fact without variables is removed directly.
4. Use \`list_facts\` and \`count_facts\` to inspect the store.
5. Use \`clear_facts\` only when asked to wipe the store.`;

export const TOOL_PROMPTS: Record<string, string> = {
  add_fact:
    'Store one fact given as id, predicate and object. Every part must be a concrete value; variables are rejected.',

  query_facts:
    'Answer a query written as clauses separated by " . ". Each answer maps every variable to a value. A query without variables returns one empty answer when it holds.',

  remove_facts:
    'Remove the facts matched by a query and report them. Earlier clauses fix variable values for later ones.',

  list_facts: 'List every stored fact as { id, predicate, object }.',

  count_facts: 'Report how many facts are stored.',

  clear_facts: 'Remove every stored fact. Only use when the user explicitly asks for it.',
};
