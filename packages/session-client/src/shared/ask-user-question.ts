import { z } from "zod";

export const ASK_USER_QUESTION_TOOL = "AskUserQuestion";

const QuestionOptionSchema = z.object({
  label: z.string().min(1),
  description: z.string().optional(),
});

const QuestionSchema = z.object({
  question: z.string().min(1),
  header: z.string().optional(),
  options: z.array(QuestionOptionSchema).default([]),
  multiSelect: z.boolean().default(false),
});

const AskUserQuestionInputSchema = z.object({
  questions: z.array(QuestionSchema).min(1),
});

export type QuestionOption = z.infer<typeof QuestionOptionSchema>;
export type QuestionItem = z.infer<typeof QuestionSchema>;

export interface QuestionRequest {
  id: string;
  questions: QuestionItem[];
}

export function parseAskUserQuestion(params: {
  toolUseId: string | undefined;
  input: Record<string, unknown> | undefined;
}): QuestionRequest | null {
  const parsed = AskUserQuestionInputSchema.safeParse(params.input ?? {});
  if (!parsed.success) {
    return null;
  }
  return {
    id: params.toolUseId ?? "",
    questions: parsed.data.questions,
  };
}
