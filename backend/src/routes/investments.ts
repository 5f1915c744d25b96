// src/routes/investments.ts
import { Router } from "express";
import { requireUser } from "../auth/rbac";
import { NotFoundError, PolicyViolationError } from "../errors";
import { logger } from "../logger";
import { CreateInvestmentDto, ListInvestmentsQuery, UpdateInvestmentDto } from "../types/dto";
import type { InvestmentRepository } from "../types/investment";
import {
  ValidationErrors, validateAmount, validateDate, validateLength, validatePagination, validateRequired, validateUuid
} from "../utils/validation";

export default function investmentRoutes(investments: InvestmentRepository) {
  const r = Router();

  /** Investment type catalog */
  r.get("/api/v1/investment-types", async (_req, res, next) => {
    try {
      res.json({ items: await investments.listTypes() });
    } catch (e) { next(e); }
  });

  /** Create investment */
  r.post("/api/v1/users/:user_id/investments", requireUser(), async (req, res, next) => {
    try {
      const dto = CreateInvestmentDto.parse(req.body);
      const errors = new ValidationErrors()
        .collect(validateUuid(dto.type_id, "type_id"))
        .collect(validateRequired(dto.name, "name") ?? validateLength(dto.name, "name", 1, 255))
        .collect(validateAmount(dto.amount, "amount"))
        .collect(validateDate(dto.start_date, "start_date"));
      if (dto.end_date !== undefined) {
        const bad = validateDate(dto.end_date, "end_date");
        errors.collect(bad);
        // both are YYYY-MM-DD here, so string order is date order
        if (!bad && !validateDate(dto.start_date, "start_date") && dto.end_date < dto.start_date) {
          errors.add("end_date", "end_date must not be before start_date");
        }
      }
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      if (!(await investments.findType(dto.type_id))) {
        throw new PolicyViolationError(new ValidationErrors().add("type_id", "type_id does not name a known investment type"));
      }

      const investment = await investments.create({
        user_id: req.params.user_id,
        type_id: dto.type_id,
        name: dto.name.trim(),
        amount: dto.amount,
        current_value: dto.current_value ?? null,
        start_date: dto.start_date,
        end_date: dto.end_date ?? null,
        interest_rate: dto.interest_rate ?? null,
        institution: dto.institution ?? null,
        account_number: dto.account_number ?? null,
        notes: dto.notes ?? null
      });
      logger.info({ user_id: investment.user_id, investment_id: investment.id }, "investment recorded");
      res.status(201).json(investment);
    } catch (e) { next(e); }
  });

  /** List investments */
  r.get("/api/v1/users/:user_id/investments", requireUser(), async (req, res, next) => {
    try {
      const query = ListInvestmentsQuery.parse(req.query);
      const errors = new ValidationErrors().collect(validatePagination(query.page, query.limit));
      if (query.type_id !== undefined) errors.collect(validateUuid(query.type_id, "type_id"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const items = await investments.list({
        user_id: req.params.user_id,
        type_id: query.type_id,
        status: query.status,
        institution: query.institution,
        limit: query.limit,
        offset: (query.page - 1) * query.limit
      });
      res.json({ items, page: query.page, limit: query.limit });
    } catch (e) { next(e); }
  });

  /** Get one investment */
  r.get("/api/v1/users/:user_id/investments/:investment_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.investment_id, "investment_id")) throw new NotFoundError();
      const investment = await investments.findById(req.params.user_id, req.params.investment_id);
      if (!investment) throw new NotFoundError();
      res.json(investment);
    } catch (e) { next(e); }
  });

  /** Update investment (partial) */
  r.patch("/api/v1/users/:user_id/investments/:investment_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.investment_id, "investment_id")) throw new NotFoundError();
      const dto = UpdateInvestmentDto.parse(req.body);
      const errors = new ValidationErrors();
      if (dto.name !== undefined) errors.collect(validateRequired(dto.name, "name") ?? validateLength(dto.name, "name", 1, 255));
      if (dto.amount !== undefined) errors.collect(validateAmount(dto.amount, "amount"));
      if (dto.end_date !== undefined) errors.collect(validateDate(dto.end_date, "end_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const investment = await investments.update(req.params.user_id, req.params.investment_id, {
        ...dto,
        name: dto.name?.trim()
      });
      if (!investment) throw new NotFoundError();
      res.json(investment);
    } catch (e) { next(e); }
  });

  /** Delete investment */
  r.delete("/api/v1/users/:user_id/investments/:investment_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.investment_id, "investment_id")) throw new NotFoundError();
      if (!(await investments.remove(req.params.user_id, req.params.investment_id))) throw new NotFoundError();
      res.status(204).end();
    } catch (e) { next(e); }
  });

  return r;
}
