// src/types/goal.ts

/** keep in sync with the CHECK constraints on financial_goals */
export const GOAL_TYPES = ["savings", "investment", "debt_payoff", "purchase", "emergency_fund"] as const;
export const GOAL_PRIORITIES = ["low", "medium", "high"] as const;
export const GOAL_STATUSES = ["active", "completed", "cancelled"] as const;

export type GoalType = (typeof GOAL_TYPES)[number];
export type GoalPriority = (typeof GOAL_PRIORITIES)[number];
export type GoalStatus = (typeof GOAL_STATUSES)[number];

export interface Goal {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  target_amount: number;
  current_amount: number;
  target_date: string | null; // YYYY-MM-DD
  goal_type: GoalType;
  priority: GoalPriority;
  status: GoalStatus;
  created_at: Date;
  updated_at: Date;
}

export type NewGoal = Pick<Goal, "user_id" | "name" | "description" | "target_amount" | "target_date" | "goal_type" | "priority">;

export type GoalPatch = Partial<Pick<
  Goal,
  "name" | "description" | "target_amount" | "target_date" | "goal_type" | "priority" | "status"
>>;

export interface GoalContribution {
  id: string;
  goal_id: string;
  amount: number;
  contribution_date: string;
  source: string | null;
  notes: string | null;
  created_at: Date;
}

export type NewContribution = Pick<GoalContribution, "amount" | "contribution_date" | "source" | "notes">;

export interface GoalFilter {
  user_id: string;
  goal_type?: GoalType;
  priority?: GoalPriority;
  status?: GoalStatus;
  limit: number;
  offset: number;
}

export interface GoalView extends Goal {
  progress: number;
  is_completed: boolean;
  is_overdue: boolean;
}

/** Percent of the target reached; 0 for a zero target, may exceed 100. */
export function goalProgress(goal: Pick<Goal, "target_amount" | "current_amount">): number {
  if (goal.target_amount === 0) return 0;
  return (goal.current_amount / goal.target_amount) * 100;
}

export function isGoalCompleted(goal: Pick<Goal, "target_amount" | "current_amount">): boolean {
  return goal.current_amount >= goal.target_amount;
}

/** today is YYYY-MM-DD; a goal due today is not overdue yet */
export function isGoalOverdue(goal: Pick<Goal, "target_amount" | "current_amount" | "target_date">, today: string): boolean {
  if (goal.target_date === null) return false;
  return today > goal.target_date && !isGoalCompleted(goal);
}

export function toGoalView(goal: Goal, today: string): GoalView {
  return {
    ...goal,
    progress: goalProgress(goal),
    is_completed: isGoalCompleted(goal),
    is_overdue: isGoalOverdue(goal, today)
  };
}

export interface GoalRepository {
  create(input: NewGoal): Promise<Goal>;
  findById(userId: string, id: string): Promise<Goal | undefined>;
  update(userId: string, id: string, patch: GoalPatch): Promise<Goal | undefined>;
  remove(userId: string, id: string): Promise<boolean>;
  /** Newest first. */
  list(filter: GoalFilter): Promise<Goal[]>;
  /** Records the contribution and adds it to current_amount; undefined when the goal is not the user's. */
  addContribution(userId: string, goalId: string, input: NewContribution): Promise<GoalContribution | undefined>;
  listContributions(userId: string, goalId: string): Promise<GoalContribution[]>;
}
