// src/lib/config_defaults.ts

/**
 * Default content for config.yaml when scaffolded on first run.
 */
export const DEFAULT_CONFIG_YAML = `# file-commander configuration (~/.fcmd/config.yaml, or $FCMD_HOME/config.yaml)
# Generated default

interpreter:
  # API keys come from the environment, never from this file:
  #   openrouter -> OPENROUTER_API_KEY, openai -> OPENAI_API_KEY, gemini -> GEMINI_API_KEY
  provider: "openrouter"
  # model_name: "deepseek/deepseek-r1"
  temperature: 0
  max_retries: 2
  retry_base_delay_ms: 1000

locations:
  # start_dir: "~" # Where relative names are resolved from
  # movies_dir: "~/Movies" # Searched by "play movie ..."
  # aliases:
  #   projects: "~/code"
  #   backups: "/mnt/backup"

# playback:
#   media_extensions: [".mp4", ".mkv", ".avi"]

logging:
  # history_file: "~/.fcmd/logs/history.jsonl"
  verbose: false
`;
