import { minimatch } from "minimatch";
import type { ChangeRecord, Priority } from "@diffscribe/model";

// ---------------------------------------------------------------------------
// Domain invariant catalog — checks that must be re-run whenever a file they
// guard changes, independent of what the diff itself shows.
// ---------------------------------------------------------------------------

export interface InvariantCheck {
  id: string;
  /** Globs over changed paths (case-insensitive) */
  triggers: string[];
  priority: Priority;
  title: string;
  preconditions: string;
  steps: string[];
  expectedResult: string;
  edgeCases: string[];
}

const AUTH_TRIGGERS = [
  "**/auth/**",
  "**/*auth*",
  "**/middleware.{ts,js}",
  "**/*session*",
];

export const INVARIANT_CATALOG: readonly InvariantCheck[] = [
  {
    id: "session-timeout",
    triggers: AUTH_TRIGGERS,
    priority: "Critical",
    title: "Idle sessions expire after the configured timeout",
    preconditions: "Signed-in user; session timeout set to a short value for the test",
    steps: [
      "Sign in and open any protected page",
      "Stay idle past the timeout",
      "Perform an action that calls the API",
    ],
    expectedResult: "User is sent to sign-in and the API answers 401; no data is saved",
    edgeCases: ["Activity just before the timeout extends the session", "Multiple tabs share one timeout"],
  },
  {
    id: "account-lockout",
    triggers: AUTH_TRIGGERS,
    priority: "Critical",
    title: "Repeated failed sign-ins lock the account",
    preconditions: "Existing account with a known password",
    steps: [
      "Submit a wrong password until the lockout threshold is reached",
      "Submit the correct password",
    ],
    expectedResult: "Account is locked and the correct password is refused until the lockout ends",
    edgeCases: ["Counter resets after a successful sign-in", "Lockout message does not reveal whether the account exists"],
  },
  {
    id: "autosave-debounce",
    triggers: ["**/packages/**", "**/package/**", "**/*package*.{ts,tsx,js,jsx}", "**/*autosave*"],
    priority: "High",
    title: "Package edits autosave once per debounce window",
    preconditions: "Draft package open in the editor",
    steps: [
      "Type continuously in a package field",
      "Stop typing and wait for the debounce window",
      "Reload the page",
    ],
    expectedResult: "One save request per pause; the reloaded package shows the last edit",
    edgeCases: ["Navigating away mid-window flushes the pending save", "Save failure is shown and retried"],
  },
  {
    id: "conditional-fields",
    triggers: ["**/workflow/**", "**/*workflow*", "**/rules/**"],
    priority: "High",
    title: "Workflow rules show and require conditional fields",
    preconditions: "Package at a workflow step that has conditional fields",
    steps: [
      "Choose an answer that enables a conditional field",
      "Leave the conditional field empty and submit",
      "Change the answer so the field is hidden and submit again",
    ],
    expectedResult: "Hidden fields are neither required nor saved; shown fields are validated",
    edgeCases: ["Previously entered value in a now-hidden field is cleared"],
  },
  {
    id: "palt-lead-time",
    triggers: ["**/*palt*", "**/*palt*/**", "**/*lead-time*", "**/*leadtime*"],
    priority: "High",
    title: "PALT lead-time validation rejects dates inside the minimum lead time",
    preconditions: "Package with an acquisition type that has a PALT requirement",
    steps: [
      "Enter a required-by date inside the lead time",
      "Enter a date exactly at the lead-time boundary",
    ],
    expectedResult: "Dates inside the lead time are rejected with the required lead time shown",
    edgeCases: ["Boundary date is accepted", "Weekends and holidays follow the configured calendar"],
  },
  {
    id: "fitara-approval",
    triggers: ["**/*fitara*", "**/*fitara*/**"],
    priority: "Critical",
    title: "IT purchases cannot advance without FITARA approval",
    preconditions: "Package containing an IT line item",
    steps: [
      "Try to submit the package without a FITARA approval",
      "Attach an approval and submit again",
    ],
    expectedResult: "Submission is blocked until the approval is recorded",
    edgeCases: ["Removing the IT line item lifts the requirement"],
  },
  {
    id: "tier-navigation",
    triggers: ["**/tier*/**", "**/*tier*.{tsx,jsx,ts,js}"],
    priority: "High",
    title: "Moving between tier forms keeps entered data",
    preconditions: "Package with data entered in more than one tier",
    steps: [
      "Fill in part of a tier form",
      "Go to another tier and back",
    ],
    expectedResult: "All entered values are still present",
    edgeCases: ["Browser back button", "Switching tiers with a validation error on screen"],
  },
  {
    id: "migration-production-copy",
    triggers: ["**/migrations/**", "**/*.prisma", "**/*.sql"],
    priority: "Critical",
    title: "Migration applies cleanly to a copy of production data",
    preconditions: "Restored copy of the production database",
    steps: [
      "Apply the migration",
      "Run the application smoke tests",
      "Roll the migration back where a down script exists",
    ],
    expectedResult: "Migration and rollback finish without errors and no rows are lost",
    edgeCases: ["Rows with NULLs in newly required columns", "Large tables within the maintenance window"],
  },
  {
    id: "section-508-contrast",
    triggers: ["**/*.{css,scss,sass,less}", "**/tailwind.config.*"],
    priority: "Medium",
    title: "Changed styles meet Section 508 contrast",
    preconditions: "Head build running",
    steps: [
      "Open the screens affected by the style change",
      "Check text and control contrast with an accessibility checker",
    ],
    expectedResult: "Contrast ratio is at least 4.5:1 for text and 3:1 for controls",
    edgeCases: ["Focus outlines remain visible", "High-contrast mode"],
  },
];

/** Catalog entries whose triggers match at least one changed path, in catalog order. */
export function triggeredInvariants(
  changes: readonly ChangeRecord[],
  catalog: readonly InvariantCheck[] = INVARIANT_CATALOG,
): InvariantCheck[] {
  return catalog.filter((check) =>
    changes.some((c) =>
      check.triggers.some((t) => minimatch(c.path, t, { dot: true, nocase: true })),
    ),
  );
}
