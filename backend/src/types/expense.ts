// src/types/expense.ts

export type SortOrder = "asc" | "desc";

export interface ExpenseCategory {
  id: string;
  name: string;
  description: string | null;
  color: string; // #RRGGBB
  icon: string | null;
  created_at: Date;
  updated_at: Date;
}

/** Row shape of the expenses table; amount in currency units, dates YYYY-MM-DD */
export interface Expense {
  id: string;
  user_id: string;
  category_id: string;
  amount: number;
  description: string;
  expense_date: string;
  payment_method: string | null;
  location: string | null;
  receipt_url: string | null;
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export type NewExpense = Omit<Expense, "id" | "created_at" | "updated_at">;

/** Absent fields stay as they are. */
export type ExpensePatch = Partial<Pick<
  Expense,
  "category_id" | "amount" | "description" | "expense_date" | "payment_method" | "location" | "receipt_url" | "tags"
>>;

export interface ExpenseFilter {
  user_id: string;
  category_id?: string;
  start_date?: string;
  end_date?: string;
  min_amount?: number;
  max_amount?: number;
  payment_method?: string;
  sort_order: SortOrder;
  limit: number;
  offset: number;
}

export interface ExpenseRepository {
  listCategories(): Promise<ExpenseCategory[]>;
  findCategory(id: string): Promise<ExpenseCategory | undefined>;
  create(input: NewExpense): Promise<Expense>;
  findById(userId: string, id: string): Promise<Expense | undefined>;
  update(userId: string, id: string, patch: ExpensePatch): Promise<Expense | undefined>;
  remove(userId: string, id: string): Promise<boolean>;
  /** Ordered by expense_date, then created_at and id, in sort_order. */
  list(filter: ExpenseFilter): Promise<Expense[]>;
}
