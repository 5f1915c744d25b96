import request from "supertest";
import type { Express } from "express";
import { goalProgress, isGoalCompleted, isGoalOverdue } from "../src/types/goal";
import { buildHarness, signUp, type Session } from "./support/harness";

describe("goal arithmetic", () => {
  it("reports progress as a percentage of the target", () => {
    expect(goalProgress({ target_amount: 200, current_amount: 50 })).toBe(25);
    expect(goalProgress({ target_amount: 100, current_amount: 150 })).toBe(150);
    expect(goalProgress({ target_amount: 0, current_amount: 10 })).toBe(0);
  });

  it("completes once the target is reached", () => {
    expect(isGoalCompleted({ target_amount: 100, current_amount: 99.99 })).toBe(false);
    expect(isGoalCompleted({ target_amount: 100, current_amount: 100 })).toBe(true);
  });

  it("is overdue only after the target date and while unmet", () => {
    const goal = { target_amount: 100, current_amount: 10, target_date: "2026-06-14" };
    expect(isGoalOverdue(goal, "2026-06-15")).toBe(true);
    expect(isGoalOverdue(goal, "2026-06-14")).toBe(false);
    expect(isGoalOverdue({ ...goal, current_amount: 100 }, "2026-06-15")).toBe(false);
    expect(isGoalOverdue({ ...goal, target_date: null }, "2030-01-01")).toBe(false);
  });
});

describe("goals", () => {
  let app: Express;
  let jane: Session;
  let auth: string;
  let base: string;

  beforeEach(async () => {
    ({ app } = buildHarness({ clock: () => new Date("2026-06-15T12:00:00Z") }));
    jane = await signUp(app, "jane@example.com");
    auth = `Bearer ${jane.token}`;
    base = `/api/v1/users/${jane.user.id}/goals`;
  });

  async function createGoal(body: Record<string, unknown> = {}): Promise<string> {
    const res = await request(app)
      .post(base)
      .set("Authorization", auth)
      .send({ name: "Rainy day", target_amount: 1000, goal_type: "emergency_fund", ...body })
      .expect(201);
    return res.body.id;
  }

  it("creates a goal with defaults and derived fields", async () => {
    const res = await request(app)
      .post(base)
      .set("Authorization", auth)
      .send({ name: " Rainy day ", target_amount: 1000, target_date: "2026-06-01", goal_type: "emergency_fund" })
      .expect(201);

    expect(res.body).toMatchObject({
      user_id: jane.user.id,
      name: "Rainy day",
      description: null,
      priority: "medium",
      status: "active",
      current_amount: 0,
      progress: 0,
      is_completed: false,
      is_overdue: true
    });
  });

  it("rejects an unknown goal type", async () => {
    const res = await request(app)
      .post(base)
      .set("Authorization", auth)
      .send({ name: "Trip", target_amount: 500, goal_type: "vacation" })
      .expect(400);

    expect(res.body.error.message).toBe("invalid request body");
    expect(res.body.error.details).toEqual([expect.objectContaining({ field: "goal_type" })]);
  });

  it("reports a zero target and a bad date together", async () => {
    const res = await request(app)
      .post(base)
      .set("Authorization", auth)
      .send({ name: "Trip", target_amount: 0, target_date: "06/01/2026", goal_type: "purchase" })
      .expect(400);

    expect(res.body.error.message).toBe(
      "target_amount: target_amount must be greater than 0; target_date: target_date must be in YYYY-MM-DD format"
    );
  });

  it("lists newest first and filters by status", async () => {
    const older = await createGoal({ name: "Car" });
    const newer = await createGoal({ name: "House" });
    await request(app).patch(`${base}/${older}`).set("Authorization", auth).send({ status: "cancelled" }).expect(200);

    const all = await request(app).get(base).set("Authorization", auth).expect(200);
    const active = await request(app).get(base).query({ status: "active" }).set("Authorization", auth).expect(200);

    expect(all.body.items.map((g: { id: string }) => g.id)).toEqual([newer, older]);
    expect(active.body.items.map((g: { id: string }) => g.id)).toEqual([newer]);
  });

  it("keeps fields the patch leaves out", async () => {
    const id = await createGoal();
    const res = await request(app).patch(`${base}/${id}`).set("Authorization", auth).send({ priority: "high" }).expect(200);
    expect(res.body).toMatchObject({ id, name: "Rainy day", target_amount: 1000, priority: "high" });
  });

  describe("contributions", () => {
    let id: string;

    beforeEach(async () => {
      id = await createGoal({ target_date: "2026-06-01" });
    });

    it("adds to the goal and reports progress", async () => {
      const first = await request(app)
        .post(`${base}/${id}/contributions`)
        .set("Authorization", auth)
        .send({ amount: 250, contribution_date: "2026-06-10", source: "salary" })
        .expect(201);

      expect(first.body.contribution).toMatchObject({ goal_id: id, amount: 250, source: "salary", notes: null });
      expect(first.body.goal).toMatchObject({ current_amount: 250, progress: 25, is_completed: false, is_overdue: true });

      const second = await request(app)
        .post(`${base}/${id}/contributions`)
        .set("Authorization", auth)
        .send({ amount: 750, contribution_date: "2026-06-12" })
        .expect(201);

      expect(second.body.goal).toMatchObject({ current_amount: 1000, progress: 100, is_completed: true, is_overdue: false });
    });

    it("lists the history by contribution date, newest first", async () => {
      for (const day of ["2026-06-10", "2026-06-12", "2026-06-11"]) {
        await request(app)
          .post(`${base}/${id}/contributions`)
          .set("Authorization", auth)
          .send({ amount: 10, contribution_date: day })
          .expect(201);
      }

      const res = await request(app).get(`${base}/${id}/contributions`).set("Authorization", auth).expect(200);
      expect(res.body.items.map((c: { contribution_date: string }) => c.contribution_date)).toEqual([
        "2026-06-12",
        "2026-06-11",
        "2026-06-10"
      ]);
    });

    it("rejects a non-positive amount", async () => {
      const res = await request(app)
        .post(`${base}/${id}/contributions`)
        .set("Authorization", auth)
        .send({ amount: -5, contribution_date: "2026-06-10" })
        .expect(400);

      expect(res.body.error.message).toBe("amount: amount must be greater than 0");
    });

    it("answers 404 for a goal owned by someone else", async () => {
      const john = await signUp(app, "john@example.com", "John");
      const johns = await request(app)
        .post(`/api/v1/users/${john.user.id}/goals`)
        .set("Authorization", `Bearer ${john.token}`)
        .send({ name: "Bike", target_amount: 300, goal_type: "purchase" })
        .expect(201);

      await request(app)
        .post(`${base}/${johns.body.id}/contributions`)
        .set("Authorization", auth)
        .send({ amount: 10, contribution_date: "2026-06-10" })
        .expect(404);
      await request(app).get(`${base}/${johns.body.id}/contributions`).set("Authorization", auth).expect(404);
    });

    it("goes away with the goal", async () => {
      await request(app)
        .post(`${base}/${id}/contributions`)
        .set("Authorization", auth)
        .send({ amount: 10, contribution_date: "2026-06-10" })
        .expect(201);

      await request(app).delete(`${base}/${id}`).set("Authorization", auth).expect(204);
      await request(app).get(`${base}/${id}`).set("Authorization", auth).expect(404);
      await request(app).get(`${base}/${id}/contributions`).set("Authorization", auth).expect(404);
    });
  });
});
