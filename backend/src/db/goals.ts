// src/db/goals.ts
import { q } from "./index";
import { SQL } from "./sql";
import type {
  Goal, GoalContribution, GoalFilter, GoalPatch, GoalRepository, NewContribution, NewGoal
} from "../types/goal";

export class PgGoalRepository implements GoalRepository {
  async create(input: NewGoal): Promise<Goal> {
    const { rows } = await q<Goal>(SQL.insertGoal, [
      input.user_id, input.name, input.description, input.target_amount,
      input.target_date, input.goal_type, input.priority
    ]);
    return rows[0];
  }

  async findById(userId: string, id: string): Promise<Goal | undefined> {
    const { rows } = await q<Goal>(SQL.goalById, [id, userId]);
    return rows[0];
  }

  async update(userId: string, id: string, patch: GoalPatch): Promise<Goal | undefined> {
    const { rows } = await q<Goal>(SQL.updateGoal, [
      id, userId,
      patch.name ?? null, patch.description ?? null, patch.target_amount ?? null, patch.target_date ?? null,
      patch.goal_type ?? null, patch.priority ?? null, patch.status ?? null
    ]);
    return rows[0];
  }

  async remove(userId: string, id: string): Promise<boolean> {
    const { rows } = await q(SQL.deleteGoal, [id, userId]);
    return rows.length > 0;
  }

  async list(filter: GoalFilter): Promise<Goal[]> {
    const params: unknown[] = [filter.user_id];
    let where = "WHERE user_id=$1 ";
    if (filter.goal_type) { params.push(filter.goal_type); where += `AND goal_type=$${params.length} `; }
    if (filter.priority)  { params.push(filter.priority);  where += `AND priority=$${params.length} `; }
    if (filter.status)    { params.push(filter.status);    where += `AND status=$${params.length} `; }
    params.push(filter.limit, filter.offset);

    const { rows } = await q<Goal>(`
      SELECT ${SQL.goalColumns} FROM financial_goals
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
    `, params);
    return rows;
  }

  async addContribution(userId: string, goalId: string, input: NewContribution): Promise<GoalContribution | undefined> {
    const { rows } = await q<GoalContribution>(SQL.insertContribution, [
      goalId, userId, input.amount, input.contribution_date, input.source, input.notes
    ]);
    return rows[0];
  }

  async listContributions(userId: string, goalId: string): Promise<GoalContribution[]> {
    const { rows } = await q<GoalContribution>(SQL.contributionsByGoal, [goalId, userId]);
    return rows;
  }
}
