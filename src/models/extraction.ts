//extraction payload: one typed shape inside the system, converted at the record and LLM boundaries
import { z } from 'zod';

const optionalText = z.string().optional();

export const FollowUpTaskSchema = z.object({
  description: z.string(),
  priority: optionalText,
  dueDate: optionalText,
  assignedTo: optionalText,
});

export const MedicationInstructionSchema = z.object({
  medicationName: z.string(),
  dosage: optionalText,
  frequency: optionalText,
  duration: optionalText,
  specialInstructions: optionalText,
});

export const ClientReminderSchema = z.object({
  description: z.string(),
  reminderType: optionalText,
  dueDate: optionalText,
  priority: optionalText,
});

export const ClinicianTodoSchema = z.object({
  description: z.string(),
  taskType: optionalText,
  priority: optionalText,
  dueDate: optionalText,
});

export const CustomExtractionSchema = z.object({
  categoryName: z.string().min(1),
  extractedData: z.unknown(),
  confidence: z.number().min(0).max(1),
  reasoning: optionalText,
});

export const ExtractionPayloadSchema = z.object({
  followUpTasks: z.array(FollowUpTaskSchema).default([]),
  medicationInstructions: z.array(MedicationInstructionSchema).default([]),
  clientReminders: z.array(ClientReminderSchema).default([]),
  clinicianTodos: z.array(ClinicianTodoSchema).default([]),
  customExtractions: z.array(CustomExtractionSchema).optional(),
});

export type FollowUpTask = z.infer<typeof FollowUpTaskSchema>;
export type MedicationInstruction = z.infer<typeof MedicationInstructionSchema>;
export type ClientReminder = z.infer<typeof ClientReminderSchema>;
export type ClinicianTodo = z.infer<typeof ClinicianTodoSchema>;
export type CustomExtraction = z.infer<typeof CustomExtractionSchema>;
export type ExtractionPayload = z.infer<typeof ExtractionPayloadSchema>;

//record columns (snake_case, as stored)
const rowText = z.string().nullish();

const FollowUpTaskRow = z.object({ description: z.string().default(''), priority: rowText, due_date: rowText, assigned_to: rowText });
const MedicationRow = z.object({
  medication_name: z.string().default(''), dosage: rowText, frequency: rowText, duration: rowText, special_instructions: rowText,
});
const ClientReminderRow = z.object({ description: z.string().default(''), reminder_type: rowText, due_date: rowText, priority: rowText });
const ClinicianTodoRow = z.object({ description: z.string().default(''), task_type: rowText, priority: rowText, due_date: rowText });
const CustomExtractionRow = z.object({ extracted_data: z.unknown(), confidence: z.number().default(0), reasoning: rowText });

export const ExtractionRecordColumnsSchema = z.object({
  follow_up_tasks: z.array(FollowUpTaskRow).nullish().transform(v => v ?? []),
  medication_instructions: z.array(MedicationRow).nullish().transform(v => v ?? []),
  client_reminders: z.array(ClientReminderRow).nullish().transform(v => v ?? []),
  clinician_todos: z.array(ClinicianTodoRow).nullish().transform(v => v ?? []),
  custom_extractions: z.record(CustomExtractionRow).nullish().transform(v => v ?? {}),
});

export type ExtractionRecordColumns = z.infer<typeof ExtractionRecordColumnsSchema>;

//validate a payload handed over by an LLM client
export function parseExtractionPayload(raw: unknown): ExtractionPayload {
  return ExtractionPayloadSchema.parse(raw);
}

export function emptyExtractionPayload(): ExtractionPayload {
  return { followUpTasks: [], medicationInstructions: [], clientReminders: [], clinicianTodos: [] };
}

export function countExtractedItems(p: ExtractionPayload): number {
  return p.followUpTasks.length + p.medicationInstructions.length + p.clientReminders.length + p.clinicianTodos.length;
}

const opt = (v: string | null | undefined) => v ?? undefined;

//record columns -> payload
export function fromRecordColumns(raw: unknown): ExtractionPayload {
  const cols = ExtractionRecordColumnsSchema.parse(raw);
  const custom = Object.entries(cols.custom_extractions);
  return {
    followUpTasks: cols.follow_up_tasks.map(t => ({
      description: t.description, priority: opt(t.priority), dueDate: opt(t.due_date), assignedTo: opt(t.assigned_to),
    })),
    medicationInstructions: cols.medication_instructions.map(m => ({
      medicationName: m.medication_name, dosage: opt(m.dosage), frequency: opt(m.frequency),
      duration: opt(m.duration), specialInstructions: opt(m.special_instructions),
    })),
    clientReminders: cols.client_reminders.map(r => ({
      description: r.description, reminderType: opt(r.reminder_type), dueDate: opt(r.due_date), priority: opt(r.priority),
    })),
    clinicianTodos: cols.clinician_todos.map(t => ({
      description: t.description, taskType: opt(t.task_type), priority: opt(t.priority), dueDate: opt(t.due_date),
    })),
    ...(custom.length > 0 && {
      customExtractions: custom.map(([categoryName, c]) => ({
        categoryName, extractedData: c.extracted_data, confidence: c.confidence, reasoning: opt(c.reasoning),
      })),
    }),
  };
}

//payload -> record columns; custom extractions become a map keyed by category name
export function toRecordColumns(p: ExtractionPayload): ExtractionRecordColumns {
  return {
    follow_up_tasks: p.followUpTasks.map(t => ({
      description: t.description, priority: t.priority ?? null, due_date: t.dueDate ?? null, assigned_to: t.assignedTo ?? null,
    })),
    medication_instructions: p.medicationInstructions.map(m => ({
      medication_name: m.medicationName, dosage: m.dosage ?? null, frequency: m.frequency ?? null,
      duration: m.duration ?? null, special_instructions: m.specialInstructions ?? null,
    })),
    client_reminders: p.clientReminders.map(r => ({
      description: r.description, reminder_type: r.reminderType ?? null, due_date: r.dueDate ?? null, priority: r.priority ?? null,
    })),
    clinician_todos: p.clinicianTodos.map(t => ({
      description: t.description, task_type: t.taskType ?? null, priority: t.priority ?? null, due_date: t.dueDate ?? null,
    })),
    custom_extractions: Object.fromEntries((p.customExtractions ?? []).map(c => [
      c.categoryName, { extracted_data: c.extractedData, confidence: c.confidence, reasoning: c.reasoning ?? null },
    ])),
  };
}

//flat text form of a payload, used as the embedded document for extraction records
export function extractionToText(p: ExtractionPayload): string {
  const parts: string[] = [];
  if (p.followUpTasks.length) {
    parts.push('Follow-up tasks:', ...p.followUpTasks.map(t => `- ${t.description} (Priority: ${t.priority ?? ''})`));
  }
  if (p.medicationInstructions.length) {
    parts.push('Medications:', ...p.medicationInstructions.map(m => `- ${m.medicationName} ${m.dosage ?? ''} ${m.frequency ?? ''}`));
  }
  if (p.clientReminders.length) {
    parts.push('Client reminders:', ...p.clientReminders.map(r => `- ${r.description} (${r.reminderType ?? ''})`));
  }
  if (p.clinicianTodos.length) {
    parts.push('Clinician tasks:', ...p.clinicianTodos.map(t => `- ${t.description} (${t.taskType ?? ''})`));
  }
  return parts.join('\n');
}
