/**
 * Grading instructions sent as the system message of each judge call.
 */

export const DIFF_SYNTAX_INSTRUCTIONS = `You will be given a git diff that was generated by an automated system. Your job
is to flag certain common errors. Please reply with a json object with the
following schema:
off_by_one: true if you believe a line was inserted at the wrong place otherwise
false
The following two fields are only required if off_by_one is true:
off_by_one_lines: a list of line numbers that you believe were inserted at the
wrong place
off_by_one_direction: a list of integers that are how off you believe the
insertions were, in the same order as off_by_one_lines. A positive number means
the line was inserted too low, a negative number means too high.
indentation: true if you believe the indentation is incorrect otherwise false
The following two fields are only required if indentation is true:
indentation_lines: a list of line numbers that you believe have incorrect
indentation.
indentation_direction: a list of integers that are how off you believe the
indentation is, in the same order as indentation_lines. A positive number means
the line was indented too far, a negative number means not enough.
syntax: true if you believe there is a syntax error unrelated to insertion
location or indentation.
syntax_description: a string describing the syntax errors if present.`;

export const MODEL_RESPONSE_INSTRUCTIONS = `You will be given a model's response to a prompt. You won't be given the full
context of the response. You are just looking for certain stylistic errors.
Respond in json. The following fields are required:
referenced_format: boolean, true if the model talks about its edit format in any
way in its response. For example if it has a clause like "The edits in the
requested format are:"
trailing_waffling: boolean, true if after the structured edits the model ends
with a clause like "Please note I may not have had all the information I needed"`;

export const COMPARISON_INSTRUCTIONS = `You will be given two diffs. The first was human written and the second was
generated by an automated system. Your job is to grade the automated diff. Respond in
json. The following fields are required:
missing_functionality: true if the generated diff is missing functionality
present in the human written diff.
missing_description: optional string describing what's missing
extra_functionality: true if the generated diff has functionality not present
in the human written diff.
extra_description: optional string describing what's extra`;

/** Content message for a comparison: reference diff first, then the generated one */
export function formatComparisonContent(referenceDiff: string, generatedDiff: string): string {
  return `HUMAN WRITTEN DIFF:\n${referenceDiff}\nGENERATED DIFF:\n${generatedDiff}`;
}
