import type { RuleTable } from "@diffscribe/model";

const TESTS = ["**/*.{test,spec}.{ts,tsx,js,jsx}", "**/__tests__/**"];

// ---------------------------------------------------------------------------
// Default classification table. Order is part of the contract: a path that
// matches two rules always lands in the earlier one.
// ---------------------------------------------------------------------------

export const DEFAULT_RULES: RuleTable = [
  {
    category: "API",
    priority: "Critical",
    patterns: [
      "app/api/**/route.{ts,js}",
      "src/app/api/**/route.{ts,js}",
      "pages/api/**/*.{ts,js}",
      "src/pages/api/**/*.{ts,js}",
    ],
  },
  {
    category: "Database",
    priority: "Critical",
    patterns: [
      "**/*.prisma",
      "**/migrations/**",
      "**/db/schema/**",
      "**/*.sql",
    ],
  },
  {
    category: "Auth",
    priority: "Critical",
    patterns: [
      "**/auth/**",
      "**/*auth*.{ts,tsx,js,jsx}",
      "middleware.{ts,js}",
      "src/middleware.{ts,js}",
      "**/security/**",
      "**/*session*.{ts,tsx,js,jsx}",
    ],
    exclude: TESTS,
  },
  {
    category: "BusinessLogic",
    priority: "High",
    patterns: [
      "lib/**/*.{ts,js}",
      "src/lib/**/*.{ts,js}",
      "**/services/**/*.{ts,js}",
      "**/workflow/**/*.{ts,js}",
    ],
    exclude: TESTS,
  },
  {
    category: "Types",
    priority: "Medium",
    patterns: ["types/**", "src/types/**", "**/*.d.ts"],
  },
  {
    category: "UIComponent",
    priority: "Medium",
    patterns: [
      "components/**/*.{tsx,jsx}",
      "src/components/**/*.{tsx,jsx}",
      "app/**/*.{tsx,jsx}",
      "src/app/**/*.{tsx,jsx}",
    ],
    exclude: ["**/tier*/**", "**/*tier*.{tsx,jsx}", ...TESTS],
  },
  {
    category: "TierForm",
    priority: "High",
    patterns: ["**/tier*/**", "**/*tier*.{tsx,jsx,ts,js}"],
    exclude: TESTS,
  },
  {
    category: "Styling",
    priority: "Low",
    patterns: [
      "**/*.{css,scss,sass,less}",
      "tailwind.config.{js,cjs,mjs,ts}",
      "postcss.config.{js,cjs,mjs}",
    ],
  },
  {
    category: "Config",
    priority: "Medium",
    patterns: [
      "**/package.json",
      "tsconfig*.json",
      "**/*.config.{js,cjs,mjs,ts}",
      ".env*",
      ".github/**",
      "Dockerfile",
      "docker-compose*.{yml,yaml}",
      ".eslintrc*",
    ],
  },
  {
    category: "DocsTests",
    priority: "Low",
    patterns: [
      "**/*.md",
      "docs/**",
      ...TESTS,
      "e2e/**",
      "tests/**",
    ],
  },
];
