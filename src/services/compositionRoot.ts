export const COMPOSITION_ROOT = "src/App.jsx";

export interface InjectionResult {
  content: string;
  imported: boolean;
  mounted: boolean;
}

const MOUNT_ANCHORS = ["</div>", "</main>", "</>"];

export const isReferenced = (source: string, component: string): boolean =>
  new RegExp(`from\\s+['"]\\./components/${component}(?:\\.jsx)?['"]`).test(source) ||
  new RegExp(`<${component}[\\s/>]`).test(source);

const addImport = (source: string, component: string): string => {
  const statement = `import ${component} from './components/${component}'`;
  const lines = source.split("\n");
  let lastImport = -1;
  lines.forEach((line, index) => {
    if (line.trimStart().startsWith("import ")) lastImport = index;
  });
  lines.splice(lastImport + 1, 0, statement);
  return lines.join("\n");
};

const addMount = (source: string, component: string): { content: string; mounted: boolean } => {
  for (const anchor of MOUNT_ANCHORS) {
    const index = source.lastIndexOf(anchor);
    if (index === -1) continue;

    const lineStart = source.lastIndexOf("\n", index - 1) + 1;
    const before = source.slice(lineStart, index);
    if (before.trim() === "") {
      const tag = `${before}  <${component} />\n`;
      return { content: source.slice(0, lineStart) + tag + source.slice(lineStart), mounted: true };
    }
    return { content: `${source.slice(0, index)}<${component} />${source.slice(index)}`, mounted: true };
  }
  return { content: source, mounted: false };
};

// Adds an import and a mount tag for a new component; a component already referenced is left alone.
export const injectComponent = (source: string, component: string): InjectionResult => {
  if (isReferenced(source, component)) {
    return { content: source, imported: false, mounted: false };
  }
  const withImport = addImport(source, component);
  const { content, mounted } = addMount(withImport, component);
  return { content, imported: true, mounted };
};
