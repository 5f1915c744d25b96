// src/types/dto.ts
import { z } from "zod";
import { GOAL_PRIORITIES, GOAL_STATUSES, GOAL_TYPES } from "./goal";
import { INVESTMENT_STATUSES } from "./investment";

/** Field formats; utils/validation turns their issues into field messages */
export const EmailAddress = z.string().email().max(254);
export const Uuid = z.string().uuid();
export const IsoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/).date(); // e.g. 2025-01-31

/**
 * The request schemas below only check shape; field rules (email syntax,
 * names, amounts, password policy) go through ValidationErrors so every
 * violation is reported at once.
 */
const atLeastOneField = <T extends object>(v: T) => Object.values(v).some((x) => x !== undefined);
const Money = z.number();
const Day = z.string();

/** ---------------- Auth ---------------- */
export const RegisterDto = z.object({
  email: z.string(),
  password: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  phone: z.string().optional(),
  date_of_birth: Day.optional()
});
export type RegisterDto = z.infer<typeof RegisterDto>;

export const LoginDto = z.object({
  email: z.string().min(1),
  password: z.string().min(1)
});
export type LoginDto = z.infer<typeof LoginDto>;

export const RefreshDto = z.object({
  refresh_token: z.string().min(1)
});
export type RefreshDto = z.infer<typeof RefreshDto>;

/** ---------------- Users ---------------- */
export const UpdateUserDto = z.object({
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  phone: z.string().nullable().optional(),
  date_of_birth: Day.nullable().optional()
}).refine(atLeastOneField, { message: "at least one field is required" });
export type UpdateUserDto = z.infer<typeof UpdateUserDto>;

export const ListUsersQuery = z.object({
  limit: z.coerce.number().int().default(50),
  cursor: z.string().optional()
});
export type ListUsersQuery = z.infer<typeof ListUsersQuery>;

/** Offset paging shared by the finance lists */
const PageQuery = {
  page: z.coerce.number().int().default(1),
  limit: z.coerce.number().int().default(20)
};

/** ---------------- Expenses ---------------- */
export const CreateExpenseDto = z.object({
  category_id: z.string(),
  amount: Money,
  description: z.string(),
  expense_date: Day,
  payment_method: z.string().max(50).optional(),
  location: z.string().max(255).optional(),
  receipt_url: z.string().url().optional(),
  tags: z.array(z.string().min(1).max(50)).max(20).optional()
});
export type CreateExpenseDto = z.infer<typeof CreateExpenseDto>;

export const UpdateExpenseDto = CreateExpenseDto.partial().refine(atLeastOneField, {
  message: "at least one field is required"
});
export type UpdateExpenseDto = z.infer<typeof UpdateExpenseDto>;

export const ListExpensesQuery = z.object({
  ...PageQuery,
  sort_order: z.string().default(""),
  category_id: z.string().optional(),
  start_date: Day.optional(),
  end_date: Day.optional(),
  min_amount: z.coerce.number().optional(),
  max_amount: z.coerce.number().optional(),
  payment_method: z.string().optional()
});
export type ListExpensesQuery = z.infer<typeof ListExpensesQuery>;

/** ---------------- Goals ---------------- */
export const GoalTypeEnum = z.enum(GOAL_TYPES);
export const GoalPriorityEnum = z.enum(GOAL_PRIORITIES);
export const GoalStatusEnum = z.enum(GOAL_STATUSES);

export const CreateGoalDto = z.object({
  name: z.string(),
  description: z.string().optional(),
  target_amount: Money,
  target_date: Day.optional(),
  goal_type: GoalTypeEnum,
  priority: GoalPriorityEnum.default("medium")
});
export type CreateGoalDto = z.infer<typeof CreateGoalDto>;

export const UpdateGoalDto = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  target_amount: Money.optional(),
  target_date: Day.optional(),
  goal_type: GoalTypeEnum.optional(),
  priority: GoalPriorityEnum.optional(),
  status: GoalStatusEnum.optional()
}).refine(atLeastOneField, { message: "at least one field is required" });
export type UpdateGoalDto = z.infer<typeof UpdateGoalDto>;

export const CreateContributionDto = z.object({
  amount: Money,
  contribution_date: Day,
  source: z.string().max(100).optional(),
  notes: z.string().optional()
});
export type CreateContributionDto = z.infer<typeof CreateContributionDto>;

export const ListGoalsQuery = z.object({
  ...PageQuery,
  goal_type: GoalTypeEnum.optional(),
  priority: GoalPriorityEnum.optional(),
  status: GoalStatusEnum.optional()
});
export type ListGoalsQuery = z.infer<typeof ListGoalsQuery>;

/** ---------------- Investments ---------------- */
export const InvestmentStatusEnum = z.enum(INVESTMENT_STATUSES);

export const CreateInvestmentDto = z.object({
  type_id: z.string(),
  name: z.string(),
  amount: Money,
  current_value: z.number().nonnegative().optional(),
  start_date: Day,
  end_date: Day.optional(),
  interest_rate: z.number().min(0).max(100).optional(),
  institution: z.string().max(255).optional(),
  account_number: z.string().max(100).optional(),
  notes: z.string().optional()
});
export type CreateInvestmentDto = z.infer<typeof CreateInvestmentDto>;

export const UpdateInvestmentDto = z.object({
  name: z.string().optional(),
  amount: Money.optional(),
  current_value: z.number().nonnegative().optional(),
  end_date: Day.optional(),
  interest_rate: z.number().min(0).max(100).optional(),
  institution: z.string().max(255).optional(),
  account_number: z.string().max(100).optional(),
  notes: z.string().optional(),
  status: InvestmentStatusEnum.optional()
}).refine(atLeastOneField, { message: "at least one field is required" });
export type UpdateInvestmentDto = z.infer<typeof UpdateInvestmentDto>;

export const ListInvestmentsQuery = z.object({
  ...PageQuery,
  type_id: z.string().optional(),
  status: InvestmentStatusEnum.optional(),
  institution: z.string().optional()
});
export type ListInvestmentsQuery = z.infer<typeof ListInvestmentsQuery>;
