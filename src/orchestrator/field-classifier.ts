/**
 * Intake field classification.
 *
 * The intake prompt asks the model to tag each question with the field it is
 * asking for, e.g. "What is the title of your report? [TITLE]". Tagged
 * questions map through TAG_FIELDS; untagged ones fall back to keyword
 * matching, and anything unrecognised is filed under "notes".
 */

export const DEFAULT_INTAKE_FIELD = 'notes';

const TAG_RE = /\[([A-Z_]+)\]/;

const TAG_FIELDS: Record<string, string> = {
  TITLE: 'title',
  REPORT_TITLE: 'title',
  DEPARTMENT: 'department',
  ACADEMIC_LEVEL: 'academic_level',
  TARGET_AUDIENCE: 'target_audience',
  TOPIC: 'topic',
  OBJECTIVE: 'objectives',
  OBJECTIVES: 'objectives',
  PROBLEM: 'problem_statement',
  PROBLEM_STATEMENT: 'problem_statement',
  SAMPLE_SIZE: 'sample_size',
  LENGTH: 'length',
  DEADLINE: 'deadline',
  FORMAT: 'format',
  CITATIONS: 'citations',
  ADDITIONAL_REQUIREMENTS: 'additional_requirements',
  NOTES: 'notes',
};

// Order matters: the first field with a matching keyword wins.
const FIELD_KEYWORDS: ReadonlyArray<readonly [field: string, keywords: readonly string[]]> = [
  ['title', ['title', 'name', 'heading']],
  ['department', ['department', 'faculty', 'school', 'discipline']],
  ['academic_level', ['academic level', 'level', 'grade', 'year']],
  ['target_audience', ['audience', 'readers', 'who will read', 'intended for']],
  ['objectives', ['objective', 'aim', 'goal']],
  ['problem_statement', ['problem statement', 'problem', 'research question']],
  ['sample_size', ['sample size', 'sample', 'participants', 'respondents']],
  ['topic', ['topic', 'subject', 'about', 'focus']],
  ['length', ['length', 'pages', 'words', 'how long']],
  ['deadline', ['deadline', 'due date', 'when is', 'submit']],
  ['format', ['format', 'style', 'structure', 'organized']],
  ['citations', ['citation', 'reference', 'sources', 'bibliography']],
  ['additional_requirements', ['requirements', 'additional', 'special', 'specific']],
  ['notes', ['notes', 'anything else', 'other']],
];

/** Tags the intake prompt is told to use, for the system prompt. */
export const INTAKE_TAGS = Object.keys(TAG_FIELDS);

/**
 * Work out which intake field the user's reply answers, from the assistant
 * question that preceded it.
 */
export function classifyIntakeField(previousQuestion: string): string {
  if (!previousQuestion) return DEFAULT_INTAKE_FIELD;

  const tag = TAG_RE.exec(previousQuestion)?.[1];
  if (tag) {
    return TAG_FIELDS[tag] ?? tag.toLowerCase();
  }

  const question = previousQuestion.toLowerCase();
  for (const [field, keywords] of FIELD_KEYWORDS) {
    if (keywords.some((keyword) => question.includes(keyword))) {
      return field;
    }
  }
  return DEFAULT_INTAKE_FIELD;
}
