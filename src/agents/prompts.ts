/**
 * Default prompt templates. Placeholders use `{name}` syntax, see
 * utilities/template.ts.
 */

// =============================================================================
// PLAN AND SOLVE
// =============================================================================

export const DEFAULT_PLANNER_PROMPT = `
You are a top-tier AI planning expert. Your task is to decompose complex user problems into an action plan consisting of multiple simple steps.
Make sure each step in the plan is an independent, executable subtask, and strictly follow logical order.
Your output must be a JSON array of strings, where each element describes one subtask (at most 4 subtasks).

Question: {question}

Output your plan strictly in the following format:
\`\`\`json
["Step 1", "Step 2", "Step 3"]
\`\`\`
`;

export const DEFAULT_EXECUTOR_PROMPT = `
You are a top-tier AI execution expert. Your task is to strictly follow the given plan and solve the problem step by step.
You will receive the original problem, the complete plan, and the steps completed so far with their results.
Please focus on solving the "current step" concisely and only output the final answer for that step, without any additional explanations or dialogue.

# Original Question:
{question}

# Complete Plan:
{plan}

# History and Results:
{history}

# Current Step:
{current_step}

Please only output the answer for the "current step":
`;

export interface PlanSolvePrompts {
  planner: string;
  executor: string;
}

// =============================================================================
// REFLECTION
// =============================================================================

export const DEFAULT_REFLECTION_PROMPTS: ReflectionPrompts = {
  initial: `
Please complete the following task:

Task: {task}

Provide a complete and accurate answer.
`,
  reflect: `
Please carefully review the following answer and identify potential issues or areas for improvement:

# Original Task:
{task}

# Current Answer:
{content}

Analyze the quality of this answer, point out any shortcomings, and provide specific suggestions for improvement.
If the answer is already satisfactory, reply with "No improvement needed".
`,
  refine: `
Please improve your answer based on the feedback:

# Original Task:
{task}

# Previous Answer:
{last_attempt}

# Feedback:
{feedback}

Provide an improved answer.
`,
};

export interface ReflectionPrompts {
  initial: string;
  reflect: string;
  refine: string;
}

/**
 * Placeholders each template is expected to use. Missing ones are reported
 * with a warning when a custom template is supplied.
 */
export const EXPECTED_PLACEHOLDERS = {
  planner: ['question'],
  executor: ['question', 'plan', 'history', 'current_step'],
  initial: ['task'],
  reflect: ['task', 'content'],
  refine: ['task', 'last_attempt', 'feedback'],
} as const satisfies Record<keyof PlanSolvePrompts | keyof ReflectionPrompts, readonly string[]>;
