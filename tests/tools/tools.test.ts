import { describe, it, expect } from "vitest";
import { invokeOperation } from "../../src/tools/index.js";
import { isUserRequiredField } from "../../src/tools/describeObject.js";
import { callAt, emptyResponse, jsonResponse, stubFetch } from "../helpers.js";
import { createTestRuntime } from "./testRuntime.js";

const CASE_DESCRIBE = {
  name: "Case",
  label: "Case",
  custom: false,
  fields: [
    { name: "Id", label: "Case ID", type: "id", nillable: false, createable: false },
    { name: "Subject", label: "Subject", type: "string", length: 255, nillable: false, createable: true, defaultedOnCreate: false },
    { name: "OwnerId", label: "Owner ID", type: "reference", nillable: false, createable: true, defaultedOnCreate: true, referenceTo: ["User"] },
    {
      name: "Status",
      label: "Status",
      type: "picklist",
      nillable: false,
      createable: true,
      defaultValue: "New",
      picklistValues: [
        { value: "New", label: "New", active: true },
        { value: "Legacy", label: "Legacy", active: false },
      ],
    },
    { name: "CaseNumber", label: "Case Number", type: "string", nillable: false, createable: false, autoNumber: true },
    { name: "Description", label: "Description", type: "textarea", nillable: true, createable: true },
    { name: "Region__c", label: "Region", type: "string", length: 40, nillable: false, createable: true, custom: true },
  ],
};

describe("salesforce_describe_object", () => {
  it("summarizes every field", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse(CASE_DESCRIBE));
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_describe_object",
      arguments: { object_type: "Case" },
    });

    expect(response).toMatchObject({ result: { name: "Case", label: "Case", custom: false, fieldCount: 7 } });
    const result = "result" in response ? response.result : undefined;
    expect(result).toMatchObject({
      fields: expect.arrayContaining([
        { name: "OwnerId", label: "Owner ID", type: "reference", required: false, referenceTo: ["User"] },
        { name: "Status", label: "Status", type: "picklist", required: true, picklistValues: ["New"] },
      ]),
    });
  });

  it("keeps only the fields a user must fill in when asked", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse(CASE_DESCRIBE));
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_describe_object",
      arguments: { object_type: "Case", required_only: true },
    });

    expect(response).toEqual({
      result: {
        name: "Case",
        label: "Case",
        custom: false,
        fieldCount: 2,
        fields: [
          { name: "Subject", label: "Subject", type: "string", length: 255, required: true },
          { name: "Region__c", label: "Region", type: "string", length: 40, required: true, custom: true },
        ],
      },
    });
  });

  it("treats system fields as filled in by Salesforce", () => {
    expect(isUserRequiredField({ name: "CreatedDate", label: "Created", type: "datetime", nillable: false, createable: true })).toBe(false);
    expect(isUserRequiredField({ name: "Subject", label: "Subject", type: "string", nillable: false })).toBe(true);
  });
});

describe("salesforce_list_objects", () => {
  const GLOBAL = {
    sobjects: [
      { name: "Account", label: "Account", custom: false, queryable: true },
      { name: "Invoice__c", label: "Invoice", custom: true, queryable: true },
      { name: "ContactFeed", label: "Contact Feed", custom: false },
    ],
  };

  it("filters by name or label fragment and by custom flag", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => jsonResponse(GLOBAL));
    const { runtime } = createTestRuntime();

    const search = await invokeOperation(runtime, {
      operation_name: "salesforce_list_objects",
      arguments: { search: "FEED" },
    });
    const custom = await invokeOperation(runtime, {
      operation_name: "salesforce_list_objects",
      arguments: { custom_only: true },
    });

    expect(search).toEqual({
      result: { count: 1, objects: [{ name: "ContactFeed", label: "Contact Feed", custom: false, queryable: false }] },
    });
    expect(custom).toEqual({
      result: { count: 1, objects: [{ name: "Invoice__c", label: "Invoice", custom: true, queryable: true }] },
    });
  });
});

describe("record tools", () => {
  it("creates a record and returns its id", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "001A", success: true, errors: [] }, 201));
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_create_record",
      arguments: { object_type: "Account", data: { Name: "Acme" } },
    });

    expect(response).toEqual({ result: { success: true, id: "001A" } });
  });

  it("refuses an update without fields", async () => {
    const fetchMock = stubFetch();
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_update_record",
      arguments: { object_type: "Account", record_id: "001A", data: {} },
    });

    expect(response).toMatchObject({
      error_kind: "invalid_arguments",
      details: { issues: ["data: data must set at least one field"] },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("updates and deletes records by id", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => emptyResponse());
    const { runtime } = createTestRuntime();

    const updated = await invokeOperation(runtime, {
      operation_name: "salesforce_update_record",
      arguments: { object_type: "Account", record_id: "001A", data: { Name: "Acme 2" } },
    });
    const deleted = await invokeOperation(runtime, {
      operation_name: "salesforce_delete_record",
      arguments: { object_type: "Account", record_id: "001A" },
    });

    expect(updated).toEqual({ result: { success: true, id: "001A" } });
    expect(deleted).toEqual({ result: { success: true, id: "001A" } });
    expect(callAt(fetchMock, 1).method).toBe("DELETE");
  });
});

describe("salesforce_execute_apex", () => {
  it("reports compile and execution status", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ compiled: true, success: true, compileProblem: null, exceptionMessage: null, line: -1, column: -1 })
    );
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_execute_apex",
      arguments: { apex_body: "System.debug(1);" },
    });

    expect(response).toEqual({ result: { success: true, compiled: true, executed: true } });
  });

  it("returns an apex_execution_error payload on failure", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ compiled: false, success: false, compileProblem: "Unexpected token.", exceptionMessage: null, line: 2, column: 1 })
    );
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_execute_apex",
      arguments: { apex_body: "System.debug(" },
    });

    expect(response).toEqual({
      error_kind: "apex_execution_error",
      message: "Apex compilation failed at line 2: Unexpected token.",
      details: { errorCode: "APEX_EXECUTION_ERROR", compileProblem: "Unexpected token.", line: 2 },
    });
  });
});

describe("report tools", () => {
  it("lists reports by id and name", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse([{ id: "00O1", name: "Pipeline", describeUrl: "/services/data/v59.0/analytics/reports/00O1/describe" }])
    );
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, { operation_name: "salesforce_list_reports" });

    expect(response).toEqual({ result: { count: 1, reports: [{ id: "00O1", name: "Pipeline" }] } });
  });

  it("runs a report and returns the raw result", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ attributes: { reportId: "00O1" }, factMap: {} }));
    const { runtime } = createTestRuntime();

    const response = await invokeOperation(runtime, {
      operation_name: "salesforce_run_report",
      arguments: { report_id: "00O1" },
    });

    expect(response).toEqual({ result: { attributes: { reportId: "00O1" }, factMap: {} } });
  });
});
