export function usage(program: string = "mdnsd"): string {
    return `Usage:
  ${program} --name <name> [--interface <iface> ...]
  ${program} <name> [--interface <iface> ...]

Options:
  -n, --name <name>           Host name, resolves as <name>.local
  -i, --interface <iface>     Interface name, repeatable. Default is '*' (all)
      --poll-interval <secs>  Seconds between interface polls (default 3)
  -c, --config <path>         Path to config file
  -l, --log-level <level>     Log level (silent, error, warn, log, debug, verbose)
  -v, --verbose               Enable verbose logging (-v debug, -vv verbose)
  -f, --log-file <path>       Append log lines to a file
  -h, --help                  Show this help
      --version               Show version number`;
}
