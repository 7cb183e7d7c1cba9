/** Starter configuration written by `deny-guard init`. */
export function sampleConfig(): string {
  return `backend: automaton
emptyPolicy: error
limits:
  maxDepth: 32
  maxPatterns: 100000
redactWords: true
lists:
  - name: profanity
    priority: 10
    words:
      - spam
      - scam
  - name: internal
    priority: 0
    words:
      - project-codename
server:
  host: 127.0.0.1
  port: 4100
profiles:
  fast:
    backend: compact-trie
`;
}
