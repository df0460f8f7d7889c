export default {
  extends: ["@commitlint/config-conventional"],
  rules: {
    // Allow these scopes matching project structure
    "scope-enum": [
      2,
      "always",
      ["collector", "shared", "planner", "throttle", "store", "consolidator", "aws", "cli", "deps", "ci"],
    ],
    "scope-empty": [0], // scope is optional
  },
};
