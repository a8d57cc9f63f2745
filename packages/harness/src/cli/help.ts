import { ENV } from "./options.js";

export function usage(name: string): string {
  return `Usage: ${name} [COMMAND] [OPTIONS]

Commands:
  (none)                      Run all the tests.
  test [NAME_REGEX] [CASES]   Run a subset of the tests. NAME_REGEX matches group
                              names; CASES is a list of case numbers and ranges,
                              e.g. '4,6-10,19'. Other tests are reported as skipped.
  list                        List all available tests.

Options:
  -o, --output-dir DIR   Where to store the log files of the tests [${ENV.outputDir}]
                         (default: ./_build/_tests)
  -v, --verbose          Display the test outputs instead of capturing them [${ENV.verbose}]
  -c, --compact          Compact the output of the tests [${ENV.compact}]
  -e, --show-errors      Display every test error, not only the most recent [${ENV.showErrors}]
  -q, --quick-tests      Run only the quick tests [${ENV.quickTests}]
      --json             Display JSON for the results, to be used by a script [${ENV.json}]
  -h, --help             Show this help

Exit status: the number of failing tests, or 125 if the run could not start.
`;
}
