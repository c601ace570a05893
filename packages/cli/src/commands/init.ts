import { shapesTemplate } from "../templates/shapes.js";
import { smokeTemplate } from "../templates/smoke.js";

const templates: Record<string, string> = {
  shapes: shapesTemplate,
  smoke: smokeTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}
