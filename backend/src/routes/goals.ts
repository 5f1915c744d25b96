// src/routes/goals.ts
import { Router } from "express";
import { requireUser } from "../auth/rbac";
import { NotFoundError, PolicyViolationError } from "../errors";
import { logger } from "../logger";
import { CreateContributionDto, CreateGoalDto, ListGoalsQuery, UpdateGoalDto } from "../types/dto";
import { toGoalView, type GoalRepository } from "../types/goal";
import {
  ValidationErrors, validateAmount, validateDate, validateLength, validatePagination, validateRequired, validateUuid
} from "../utils/validation";

export interface GoalRouteDeps {
  goals: GoalRepository;
  clock?: () => Date;
}

export default function goalRoutes({ goals, clock = () => new Date() }: GoalRouteDeps) {
  const r = Router();
  const today = () => clock().toISOString().slice(0, 10);

  /** Create goal */
  r.post("/api/v1/users/:user_id/goals", requireUser(), async (req, res, next) => {
    try {
      const dto = CreateGoalDto.parse(req.body);
      const errors = new ValidationErrors()
        .collect(validateRequired(dto.name, "name") ?? validateLength(dto.name, "name", 1, 255))
        .collect(validateAmount(dto.target_amount, "target_amount"));
      if (dto.target_date !== undefined) errors.collect(validateDate(dto.target_date, "target_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const goal = await goals.create({
        user_id: req.params.user_id,
        name: dto.name.trim(),
        description: dto.description ?? null,
        target_amount: dto.target_amount,
        target_date: dto.target_date ?? null,
        goal_type: dto.goal_type,
        priority: dto.priority
      });
      logger.info({ user_id: goal.user_id, goal_id: goal.id }, "goal created");
      res.status(201).json(toGoalView(goal, today()));
    } catch (e) { next(e); }
  });

  /** List goals */
  r.get("/api/v1/users/:user_id/goals", requireUser(), async (req, res, next) => {
    try {
      const query = ListGoalsQuery.parse(req.query);
      const errors = new ValidationErrors().collect(validatePagination(query.page, query.limit));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const rows = await goals.list({
        user_id: req.params.user_id,
        goal_type: query.goal_type,
        priority: query.priority,
        status: query.status,
        limit: query.limit,
        offset: (query.page - 1) * query.limit
      });
      const day = today();
      res.json({ items: rows.map((g) => toGoalView(g, day)), page: query.page, limit: query.limit });
    } catch (e) { next(e); }
  });

  /** Get one goal */
  r.get("/api/v1/users/:user_id/goals/:goal_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.goal_id, "goal_id")) throw new NotFoundError();
      const goal = await goals.findById(req.params.user_id, req.params.goal_id);
      if (!goal) throw new NotFoundError();
      res.json(toGoalView(goal, today()));
    } catch (e) { next(e); }
  });

  /** Update goal (partial) */
  r.patch("/api/v1/users/:user_id/goals/:goal_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.goal_id, "goal_id")) throw new NotFoundError();
      const dto = UpdateGoalDto.parse(req.body);
      const errors = new ValidationErrors();
      if (dto.name !== undefined) errors.collect(validateRequired(dto.name, "name") ?? validateLength(dto.name, "name", 1, 255));
      if (dto.target_amount !== undefined) errors.collect(validateAmount(dto.target_amount, "target_amount"));
      if (dto.target_date !== undefined) errors.collect(validateDate(dto.target_date, "target_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const goal = await goals.update(req.params.user_id, req.params.goal_id, { ...dto, name: dto.name?.trim() });
      if (!goal) throw new NotFoundError();
      res.json(toGoalView(goal, today()));
    } catch (e) { next(e); }
  });

  /** Delete goal and its contributions */
  r.delete("/api/v1/users/:user_id/goals/:goal_id", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.goal_id, "goal_id")) throw new NotFoundError();
      if (!(await goals.remove(req.params.user_id, req.params.goal_id))) throw new NotFoundError();
      res.status(204).end();
    } catch (e) { next(e); }
  });

  /** Contribute towards a goal */
  r.post("/api/v1/users/:user_id/goals/:goal_id/contributions", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.goal_id, "goal_id")) throw new NotFoundError();
      const dto = CreateContributionDto.parse(req.body);
      const errors = new ValidationErrors()
        .collect(validateAmount(dto.amount, "amount"))
        .collect(validateDate(dto.contribution_date, "contribution_date"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const contribution = await goals.addContribution(req.params.user_id, req.params.goal_id, {
        amount: dto.amount,
        contribution_date: dto.contribution_date,
        source: dto.source ?? null,
        notes: dto.notes ?? null
      });
      if (!contribution) throw new NotFoundError();

      const goal = await goals.findById(req.params.user_id, req.params.goal_id);
      if (!goal) throw new NotFoundError();
      res.status(201).json({ contribution, goal: toGoalView(goal, today()) });
    } catch (e) { next(e); }
  });

  /** Contribution history, newest first */
  r.get("/api/v1/users/:user_id/goals/:goal_id/contributions", requireUser(), async (req, res, next) => {
    try {
      if (validateUuid(req.params.goal_id, "goal_id")) throw new NotFoundError();
      if (!(await goals.findById(req.params.user_id, req.params.goal_id))) throw new NotFoundError();
      res.json({ items: await goals.listContributions(req.params.user_id, req.params.goal_id) });
    } catch (e) { next(e); }
  });

  return r;
}
