// src/routes/expenses.ts
import { Router } from "express";
import { requireUser } from "../auth/rbac";
import { NotFoundError, PolicyViolationError } from "../errors";
import { logger } from "../logger";
import { CreateExpenseDto, ListExpensesQuery, UpdateExpenseDto } from "../types/dto";
import type { ExpensePatch, ExpenseRepository, SortOrder } from "../types/expense";
import {
  ValidationErrors, validateAmount, validateDate, validatePagination, validateRequired, validateSortOrder, validateUuid
} from "../utils/validation";

const toSortOrder = (raw: string): SortOrder => (raw.toLowerCase() === "asc" ? "asc" : "desc");

export default function expenseRoutes(expenses: ExpenseRepository) {
  const r = Router();

  /** Category catalog */
  r.get("/api/v1/expense-categories", async (_req, res, next) => {
    try {
      res.json({ items: await expenses.listCategories() });
    } catch (e) { next(e); }
  });

  /** Create expense */
  r.post("/api/v1/users/:user_id/expenses", requireUser(), async (req, res, next) => {
    try {
      const dto = CreateExpenseDto.parse(req.body);
      const errors = new ValidationErrors()
        .collect(validateUuid(dto.category_id, "category_id"))
        .collect(validateAmount(dto.amount, "amount"))
        .collect(validateRequired(dto.description, "description"))
        .collect(validateDate(dto.expense_date, "expense_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      if (!(await expenses.findCategory(dto.category_id))) {
        throw new PolicyViolationError(new ValidationErrors().add("category_id", "category_id does not name a known category"));
      }

      const expense = await expenses.create({
        user_id: req.params.user_id,
        category_id: dto.category_id,
        amount: dto.amount,
        description: dto.description.trim(),
        expense_date: dto.expense_date,
        payment_method: dto.payment_method ?? null,
        location: dto.location ?? null,
        receipt_url: dto.receipt_url ?? null,
        tags: dto.tags ?? []
      });
      logger.info({ user_id: expense.user_id, expense_id: expense.id }, "expense recorded");
      res.status(201).json(expense);
    } catch (e) { next(e); }
  });

  /** List expenses (filters + offset paging) */
  r.get("/api/v1/users/:user_id/expenses", requireUser(), async (req, res, next) => {
    try {
      const query = ListExpensesQuery.parse(req.query);
      const errors = new ValidationErrors()
        .collect(validatePagination(query.page, query.limit))
        .collect(validateSortOrder(query.sort_order));
      if (query.category_id !== undefined) errors.collect(validateUuid(query.category_id, "category_id"));
      if (query.start_date !== undefined) errors.collect(validateDate(query.start_date, "start_date"));
      if (query.end_date !== undefined) errors.collect(validateDate(query.end_date, "end_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const items = await expenses.list({
        user_id: req.params.user_id,
        category_id: query.category_id,
        start_date: query.start_date,
        end_date: query.end_date,
        min_amount: query.min_amount,
        max_amount: query.max_amount,
        payment_method: query.payment_method,
        sort_order: toSortOrder(query.sort_order),
        limit: query.limit,
        offset: (query.page - 1) * query.limit
      });
      res.json({ items, page: query.page, limit: query.limit });
    } catch (e) { next(e); }
  });

  /** Get one expense */
  r.get("/api/v1/users/:user_id/expenses/:expense_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.expense_id, "expense_id")) throw new NotFoundError();
      const expense = await expenses.findById(req.params.user_id, req.params.expense_id);
      if (!expense) throw new NotFoundError();
      res.json(expense);
    } catch (e) { next(e); }
  });

  /** Update expense (partial) */
  r.patch("/api/v1/users/:user_id/expenses/:expense_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.expense_id, "expense_id")) throw new NotFoundError();
      const dto = UpdateExpenseDto.parse(req.body);
      const errors = new ValidationErrors();
      if (dto.category_id !== undefined) errors.collect(validateUuid(dto.category_id, "category_id"));
      if (dto.amount !== undefined) errors.collect(validateAmount(dto.amount, "amount"));
      if (dto.description !== undefined) errors.collect(validateRequired(dto.description, "description"));
      if (dto.expense_date !== undefined) errors.collect(validateDate(dto.expense_date, "expense_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      if (dto.category_id !== undefined && !(await expenses.findCategory(dto.category_id))) {
        throw new PolicyViolationError(new ValidationErrors().add("category_id", "category_id does not name a known category"));
      }

      const patch: ExpensePatch = { ...dto, description: dto.description?.trim() };
      const expense = await expenses.update(req.params.user_id, req.params.expense_id, patch);
      if (!expense) throw new NotFoundError();
      res.json(expense);
    } catch (e) { next(e); }
  });

  /** Delete expense */
  r.delete("/api/v1/users/:user_id/expenses/:expense_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.expense_id, "expense_id")) throw new NotFoundError();
      if (!(await expenses.remove(req.params.user_id, req.params.expense_id))) throw new NotFoundError();
      res.status(204).end();
    } catch (e) { next(e); }
  });

  return r;
}
