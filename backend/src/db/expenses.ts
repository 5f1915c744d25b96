// src/db/expenses.ts
import { q } from "./index";
import { SQL } from "./sql";
import type {
  Expense, ExpenseCategory, ExpenseFilter, ExpensePatch, ExpenseRepository, NewExpense
} from "../types/expense";

export class PgExpenseRepository implements ExpenseRepository {
  async listCategories(): Promise<ExpenseCategory[]> {
    const { rows } = await q<ExpenseCategory>(SQL.expenseCategories);
    return rows;
  }

  async findCategory(id: string): Promise<ExpenseCategory | undefined> {
    const { rows } = await q<ExpenseCategory>(SQL.expenseCategoryById, [id]);
    return rows[0];
  }

  async create(input: NewExpense): Promise<Expense> {
    const { rows } = await q<Expense>(SQL.insertExpense, [
      input.user_id, input.category_id, input.amount, input.description, input.expense_date,
      input.payment_method, input.location, input.receipt_url, input.tags
    ]);
    return rows[0];
  }

  async findById(userId: string, id: string): Promise<Expense | undefined> {
    const { rows } = await q<Expense>(SQL.expenseById, [id, userId]);
    return rows[0];
  }

  async update(userId: string, id: string, patch: ExpensePatch): Promise<Expense | undefined> {
    const { rows } = await q<Expense>(SQL.updateExpense, [
      id, userId,
      patch.category_id ?? null, patch.amount ?? null, patch.description ?? null, patch.expense_date ?? null,
      patch.payment_method ?? null, patch.location ?? null, patch.receipt_url ?? null, patch.tags ?? null
    ]);
    return rows[0];
  }

  async remove(userId: string, id: string): Promise<boolean> {
    const { rows } = await q(SQL.deleteExpense, [id, userId]);
    return rows.length > 0;
  }

  async list(filter: ExpenseFilter): Promise<Expense[]> {
    const params: unknown[] = [filter.user_id];
    let where = "WHERE user_id=$1 ";
    if (filter.category_id)          { params.push(filter.category_id);    where += `AND category_id=$${params.length} `; }
    if (filter.start_date)           { params.push(filter.start_date);     where += `AND expense_date >= $${params.length}::date `; }
    if (filter.end_date)             { params.push(filter.end_date);       where += `AND expense_date <= $${params.length}::date `; }
    if (filter.min_amount !== undefined) { params.push(filter.min_amount); where += `AND amount >= $${params.length} `; }
    if (filter.max_amount !== undefined) { params.push(filter.max_amount); where += `AND amount <= $${params.length} `; }
    if (filter.payment_method)       { params.push(filter.payment_method); where += `AND payment_method=$${params.length} `; }

    // sort_order is "asc" | "desc" by type, never client text
    const dir = filter.sort_order === "asc" ? "ASC" : "DESC";
    params.push(filter.limit, filter.offset);

    const { rows } = await q<Expense>(`
      SELECT ${SQL.expenseColumns} FROM expenses
      ${where}
      ORDER BY expense_date ${dir}, created_at ${dir}, id ${dir}
      LIMIT $${params.length - 1} OFFSET $${params.length}
    `, params);
    return rows;
  }
}
