import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import type { TaskInfo } from "@planner/shared";
import { createApp, type App } from "../index";
import { createTestDb, type TestDb } from "./helpers/test-db";
import { readData, readError, sendJson } from "./helpers/request";

let testDb: TestDb;
let app: App;

beforeAll(async () => {
  testDb = await createTestDb();
  app = createApp({ db: testDb.db, logRequests: false });
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await testDb.reset();
});

const listTasks = async (query = "") => readData<TaskInfo[]>(await app.request(`/tasks${query}`));

describe("POST /tasks", () => {
  it("creates a task and returns 201 with snake_case fields", async () => {
    const res = await sendJson(app, "POST", "/tasks", {
      title: "Buy milk",
      description: "2 liters",
      due_date: "2025-03-01",
      start_time: "2025-03-01T17:00:00Z",
    });

    expect(res.status).toBe(201);
    const task = await readData<TaskInfo>(res);
    expect(task).toMatchObject({
      id: 1,
      title: "Buy milk",
      description: "2 liters",
      is_recurring: false,
      recurrence_type: "none",
      recurrence_group_id: null,
      is_completed: false,
      due_date: "2025-03-01",
      start_time: "2025-03-01T17:00:00.000Z",
      end_time: null,
      time_tracked_seconds: 0,
    });
    expect(typeof task.created_at).toBe("string");
  });

  it("expands a weekly recurring task", async () => {
    const res = await sendJson(app, "POST", "/tasks", {
      title: "Review budget",
      due_date: "2025-03-03",
      is_recurring: true,
      recurrence_type: "weekly",
      occurrences: 3,
    });

    expect(res.status).toBe(201);
    const first = await readData<TaskInfo>(res);
    const series = await listTasks(`?recurrence_group_id=${first.recurrence_group_id}`);
    expect(series.map((task) => task.due_date)).toEqual(["2025-03-03", "2025-03-10", "2025-03-17"]);
  });

  it("requires title and due_date", async () => {
    const res = await sendJson(app, "POST", "/tasks", { description: "no title" });

    expect(res.status).toBe(400);
    const body = await readError(res);
    expect(body.code).toBe("VALIDATION_ERROR");
    expect(body.details?.map((detail) => detail.field).sort()).toEqual(["due_date", "title"]);
  });

  it("rejects an unknown recurrence type", async () => {
    const res = await sendJson(app, "POST", "/tasks", {
      title: "Pay card",
      due_date: "2025-03-01",
      is_recurring: true,
      recurrence_type: "monthly",
    });

    expect(res.status).toBe(400);
    expect((await readError(res)).details?.[0]?.field).toBe("recurrence_type");
    expect(await listTasks()).toEqual([]);
  });

  it("rejects is_recurring without a recurrence type", async () => {
    const res = await sendJson(app, "POST", "/tasks", {
      title: "Pay card",
      due_date: "2025-03-01",
      is_recurring: true,
    });

    expect(res.status).toBe(400);
    expect(await readError(res)).toEqual({
      success: false,
      error: "Recurring tasks must use recurrence_type 'daily' or 'weekly'.",
      code: "VALIDATION_ERROR",
      details: [
        {
          field: "recurrence_type",
          message: "Recurring tasks must use recurrence_type 'daily' or 'weekly'.",
        },
      ],
    });
  });

  it("rejects a malformed due date", async () => {
    const res = await sendJson(app, "POST", "/tasks", { title: "Oops", due_date: "03/01/2025" });

    expect(res.status).toBe(400);
    expect((await readError(res)).details).toEqual([
      { field: "due_date", message: "Expected a YYYY-MM-DD date or ISO 8601 datetime" },
    ]);
  });

  it("rejects a due date whose time part is out of range", async () => {
    const res = await sendJson(app, "POST", "/tasks", {
      title: "Oops",
      due_date: "2025-01-01T10:61:00Z",
    });

    expect(res.status).toBe(400);
    expect(await readError(res)).toEqual({
      success: false,
      error: "Validation failed",
      code: "VALIDATION_ERROR",
      details: [{ field: "due_date", message: "Expected a YYYY-MM-DD date or ISO 8601 datetime" }],
    });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const res = await app.request("/tasks", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect((await readError(res)).success).toBe(false);
  });
});

describe("GET /tasks/:id", () => {
  it("returns an empty description exactly as created", async () => {
    const created = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", {
        title: "Plan trip",
        description: "",
        due_date: "2025-07-01",
      }),
    );

    expect(created.description).toBe("");
    expect(await readData<TaskInfo>(await app.request(`/tasks/${created.id}`))).toEqual(created);
  });

  it("returns the stored task", async () => {
    const created = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", { title: "Plan trip", due_date: "2025-07-01" }),
    );

    const res = await app.request(`/tasks/${created.id}`);

    expect(res.status).toBe(200);
    expect(await readData<TaskInfo>(res)).toEqual(created);
  });

  it("returns 404 for a missing task", async () => {
    const res = await app.request("/tasks/99");

    expect(res.status).toBe(404);
    expect(await readError(res)).toEqual({
      success: false,
      error: "Task not found.",
      code: "NOT_FOUND",
    });
  });

  it("returns 400 for a non-numeric id", async () => {
    const res = await app.request("/tasks/abc");

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe("Invalid task ID");
  });
});

describe("GET /tasks", () => {
  it("filters by completion flag", async () => {
    const done = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", { title: "Done", due_date: "2025-03-01" }),
    );
    await sendJson(app, "POST", "/tasks", { title: "Open", due_date: "2025-03-02" });
    await sendJson(app, "PUT", `/tasks/${done.id}`, { is_completed: true });

    expect((await listTasks("?is_completed=false")).map((task) => task.title)).toEqual(["Open"]);
    expect((await listTasks("?is_completed=true")).map((task) => task.title)).toEqual(["Done"]);
  });

  it("rejects an invalid filter value", async () => {
    const res = await app.request("/tasks?due_from=soon");

    expect(res.status).toBe(400);
  });
});

describe("PUT /tasks/:id", () => {
  it("partially updates a task", async () => {
    const created = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", { title: "Write", due_date: "2025-03-01" }),
    );

    const res = await sendJson(app, "PUT", `/tasks/${created.id}`, {
      is_completed: true,
      time_tracked_seconds: 600,
    });

    expect(res.status).toBe(200);
    expect(await readData<TaskInfo>(res)).toEqual({
      ...created,
      is_completed: true,
      time_tracked_seconds: 600,
    });
  });

  it("returns 404 for a missing task and changes nothing", async () => {
    const created = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", { title: "Write", due_date: "2025-03-01" }),
    );

    const res = await sendJson(app, "PUT", "/tasks/500", { title: "Rewrite" });

    expect(res.status).toBe(404);
    expect(await listTasks()).toEqual([created]);
  });

  it("rejects negative tracked time", async () => {
    const created = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", { title: "Write", due_date: "2025-03-01" }),
    );

    const res = await sendJson(app, "PUT", `/tasks/${created.id}`, { time_tracked_seconds: -1 });

    expect(res.status).toBe(400);
  });

  it("applies title changes to the rest of the series with apply_to=all_future", async () => {
    const first = await readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", {
        title: "Yoga",
        due_date: "2025-03-01",
        is_recurring: true,
        recurrence_type: "daily",
        occurrences: 3,
      }),
    );
    const [, second] = await listTasks();

    const res = await sendJson(app, "PUT", `/tasks/${second.id}?apply_to=all_future`, {
      title: "Hot yoga",
    });

    expect(res.status).toBe(200);
    expect((await listTasks()).map((task) => task.title)).toEqual(["Yoga", "Hot yoga", "Hot yoga"]);
    expect(first.title).toBe("Yoga");
  });
});

describe("DELETE /tasks/:id", () => {
  const createSeries = async () =>
    readData<TaskInfo>(
      await sendJson(app, "POST", "/tasks", {
        title: "Practice piano",
        due_date: "2025-03-01",
        is_recurring: true,
        recurrence_type: "daily",
        occurrences: 4,
      }),
    );

  it("deletes one instance by default and returns 204", async () => {
    await createSeries();
    const [, second] = await listTasks();

    const res = await app.request(`/tasks/${second.id}`, { method: "DELETE" });

    expect(res.status).toBe(204);
    expect(await res.text()).toBe("");
    expect((await listTasks()).map((task) => task.due_date)).toEqual([
      "2025-03-01",
      "2025-03-03",
      "2025-03-04",
    ]);
  });

  it("deletes this and all future instances with apply_to=all_future", async () => {
    await createSeries();
    const [, second] = await listTasks();

    const res = await app.request(`/tasks/${second.id}?apply_to=all_future`, { method: "DELETE" });

    expect(res.status).toBe(204);
    expect((await listTasks()).map((task) => task.due_date)).toEqual(["2025-03-01"]);
  });

  it("rejects an unknown scope", async () => {
    await createSeries();
    const [first] = await listTasks();

    const res = await app.request(`/tasks/${first.id}?apply_to=everything`, { method: "DELETE" });

    expect(res.status).toBe(400);
    expect(await listTasks()).toHaveLength(4);
  });

  it("returns 404 for a missing task", async () => {
    const res = await app.request("/tasks/1", { method: "DELETE" });

    expect(res.status).toBe(404);
  });
});
