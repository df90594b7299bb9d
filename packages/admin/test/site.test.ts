import { Type } from "@sinclair/typebox";
import {
  AlreadyRegisteredError,
  ImproperlyConfiguredError,
  NotFoundError,
  ValidationError,
} from "@tracker/core";
import { describe, expect, it } from "vitest";
import {
  AdminSite,
  checkPresentation,
  defaultPresentation,
  defineModel,
  DISPLAY_FIELD,
  resolvePresentation,
} from "../src/mod.ts";

const Course = defineModel({
  name: "Course",
  schema: Type.Object({
    id: Type.Integer(),
    title: Type.String(),
    code: Type.String(),
    seats: Type.Integer({ minimum: 0 }),
  }),
  display: (course) => `${course.code} ${course.title}`,
});

const Room = defineModel({
  name: "Room",
  schema: Type.Object({ id: Type.Integer(), building: Type.String() }),
});

const courses = [
  { id: 1, title: "Linear Algebra", code: "MATH201", seats: 40 },
  { id: 2, title: "Algorithms", code: "CS301", seats: 25 },
  { id: 3, title: "Abstract Algebra", code: "MATH305", seats: 25 },
];

describe("defineModel()", () => {
  it("should fill label, primary key and display", () => {
    expect(Room.label).toBe("rooms");
    expect(Room.primaryKey).toBe("id");
    expect(Room.display({ id: 4, building: "North" })).toBe(
      "Room object (4)",
    );
  });

  it("should reject a missing primary key field", () => {
    expect(() =>
      defineModel({
        name: "Tag",
        schema: Type.Object({ slug: Type.String() }),
      })
    ).toThrow(ImproperlyConfiguredError);
  });
});

describe("AdminSite", () => {
  it("should keep registrations in order with resolved presentations", () => {
    const site = new AdminSite([
      { model: Course, presentation: { listDisplay: ["code", "title"] } },
      { model: Room },
    ]);

    expect(site.entries().map((entry) => entry.model.name)).toEqual([
      "Course",
      "Room",
    ]);
    expect(site.presentationFor("Course")).toEqual({
      ...defaultPresentation,
      listDisplay: ["code", "title"],
    });
    expect(site.presentationFor("Room")).toEqual(defaultPresentation);
  });

  it("should answer isRegistered by model or name", () => {
    const site = new AdminSite([{ model: Course }]);
    const lookalike = defineModel({
      name: "Course",
      schema: Type.Object({ id: Type.Integer() }),
    });

    expect(site.isRegistered(Course)).toBe(true);
    expect(site.isRegistered("Course")).toBe(true);
    expect(site.isRegistered(lookalike)).toBe(false);
    expect(site.isRegistered(Room)).toBe(false);
    expect(site.get("Room")).toBeUndefined();
  });

  it("should reject a model listed twice", () => {
    expect(() => new AdminSite([{ model: Course }, { model: Course }]))
      .toThrow(AlreadyRegisteredError);
  });

  it("should reject presentations naming unknown fields", () => {
    expect(() =>
      new AdminSite([
        {
          model: Course,
          presentation: { listDisplay: ["title", "instructor"] },
        },
      ])
    ).toThrow(
      'Invalid admin presentation for Course: listDisplay: "instructor" is not a field of Course',
    );
  });

  it("should throw NotFoundError for unregistered models", () => {
    const site = new AdminSite([]);

    expect(() => site.presentationFor("Course")).toThrow(NotFoundError);
  });

  describe("listRow()", () => {
    const site = new AdminSite([
      {
        model: Course,
        presentation: { listDisplay: [DISPLAY_FIELD, "seats"] },
      },
    ]);

    it("should return the listDisplay values", () => {
      expect(site.listRow("Course", courses[0])).toEqual({
        pk: 1,
        values: ["MATH201 Linear Algebra", 40],
      });
    });

    it("should reject instances that do not fit the schema", () => {
      expect(() => site.listRow("Course", { id: 9, title: "Untitled" }))
        .toThrow(ValidationError);
    });
  });

  describe("changelist()", () => {
    const site = new AdminSite([
      {
        model: Course,
        presentation: {
          listDisplay: ["code"],
          searchFields: ["title", "code"],
          ordering: ["-seats", "code"],
        },
      },
      { model: Room },
    ]);

    it("should sort by the presentation ordering", () => {
      const list = site.changelist("Course", courses);

      expect(list.columns).toEqual(["code"]);
      expect(list.rows.map((row) => row.values[0])).toEqual([
        "MATH201",
        "CS301",
        "MATH305",
      ]);
    });

    it("should filter by every search term", () => {
      const list = site.changelist("Course", courses, {
        query: "ALGEBRA math3",
      });

      expect(list.rows.map((row) => row.pk)).toEqual([3]);
    });

    it("should sort by descending primary key without an ordering", () => {
      const list = site.changelist("Room", [
        { id: 1, building: "North" },
        { id: 2, building: "South" },
      ]);

      expect(list.rows).toEqual([
        { pk: 2, values: ["Room object (2)"] },
        { pk: 1, values: ["Room object (1)"] },
      ]);
    });
  });
});

describe("checkPresentation()", () => {
  it("should report unknown fields and fields placed twice", () => {
    const issues = checkPresentation(
      Course,
      resolvePresentation({
        ordering: ["-rating"],
        fieldsets: [
          { title: null, fields: ["title", "code"] },
          { title: "Capacity", fields: ["seats", "code"] },
        ],
      }),
    );

    expect(issues).toEqual([
      { option: "ordering", message: '"rating" is not a field of Course' },
      {
        option: "fieldsets",
        message: '"code" appears in more than one fieldset',
      },
    ]);
  });

  it("should accept the default presentation for any model", () => {
    expect(checkPresentation(Room, defaultPresentation)).toEqual([]);
  });
});
