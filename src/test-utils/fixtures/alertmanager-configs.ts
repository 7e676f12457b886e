/**
 * Alertmanager configs for charm tests
 */

export const TEST_MULTITENANT_LABEL = "some_test_label";

export const TEST_DEFAULT_CONFIG = `route:
  receiver: default-receiver
  group_by:
    - alertname
receivers:
  - name: default-receiver
`;

export const TEST_VALID_CONFIG = `global:
  resolve_timeout: 5m
route:
  receiver: team-a
  group_wait: 30s
receivers:
  - name: team-a
    webhook_configs:
      - url: http://127.0.0.1:5001/
`;

export const TEST_CONFIG_WITH_TEMPLATES = (templatePath: string) => `route:
  receiver: team-b
receivers:
  - name: team-b
templates:
  - ${templatePath}
`;

export const TEST_TEMPLATE = `{{ define "team-b.title" }}[{{ .Status }}] {{ .CommonLabels.alertname }}{{ end }}
`;

// "routes" is not an Alertmanager top-level key
export const TEST_INVALID_CONFIG = `routes:
  receiver: team-a
receivers:
  - name: team-a
`;
