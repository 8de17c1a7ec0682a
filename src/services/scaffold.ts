import catalog from "../data/siteCatalog.json";
import { GeneratedFile, ProjectSpecification } from "../types";
import { slugify } from "../utils/text";

const packageJson = (spec: ProjectSpecification): string =>
  `${JSON.stringify(
    {
      name: slugify(spec.projectName || spec.title, 28) || "app",
      private: true,
      version: "0.0.0",
      type: "module",
      scripts: {
        dev: "vite",
        build: "vite build",
        preview: "vite preview"
      },
      dependencies: {
        react: "^18.2.0",
        "react-dom": "^18.2.0",
        "framer-motion": "^11.0.0",
        "react-icons": "^5.0.0"
      },
      devDependencies: {
        "@vitejs/plugin-react": "^4.2.0",
        autoprefixer: "^10.4.0",
        postcss: "^8.4.0",
        tailwindcss: "^3.4.0",
        vite: "^5.0.0"
      }
    },
    null,
    2
  )}\n`;

const viteConfig = (): string =>
  [
    "import { defineConfig } from 'vite'",
    "import react from '@vitejs/plugin-react'",
    "",
    "export default defineConfig({",
    "  plugins: [react()],",
    "})",
    ""
  ].join("\n");

const tailwindConfig = (): string =>
  [
    "export default {",
    "  content: ['./index.html', './src/**/*.{js,ts,jsx,tsx}'],",
    "  theme: {",
    "    extend: {",
    "      colors: {",
    "        accent: '#6366f1',",
    "        accent2: '#22d3ee',",
    "        dark: '#0a0a0f',",
    "        card: '#1e1e2e',",
    "      },",
    "      fontFamily: { sans: ['Inter', 'system-ui', 'sans-serif'] },",
    "    },",
    "  },",
    "  plugins: [],",
    "}",
    ""
  ].join("\n");

const escapeHtml = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

const indexHtml = (title: string): string =>
  [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="UTF-8" />',
    '  <meta name="viewport" content="width=device-width,initial-scale=1.0" />',
    `  <title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    '  <div id="root"></div>',
    '  <script type="module" src="/src/main.jsx"></script>',
    "</body>",
    "</html>",
    ""
  ].join("\n");

const mainJsx = (): string =>
  [
    "import React from 'react'",
    "import ReactDOM from 'react-dom/client'",
    "import App from './App.jsx'",
    "import './index.css'",
    "",
    "ReactDOM.createRoot(document.getElementById('root')).render(",
    "  <React.StrictMode>",
    "    <App />",
    "  </React.StrictMode>",
    ")",
    ""
  ].join("\n");

const indexCss = (colorScheme: string): string =>
  [
    `/* ${colorScheme.replace(/\*\//g, "")} */`,
    "@tailwind base;",
    "@tailwind components;",
    "@tailwind utilities;",
    "",
    "html { scroll-behavior: smooth; }",
    "body { @apply bg-dark text-white font-sans antialiased; }",
    ""
  ].join("\n");

const jsxText = (value: string): string => value.replace(/[{}<>]/g, "");

export const sectionsAppShell = (title: string, sections: string[]): string => {
  const body = sections.filter((section) => section !== "Navbar");
  return [
    "import Navbar from './components/Navbar'",
    ...body.map((section) => `import ${section} from './components/${section}'`),
    "",
    "export default function App() {",
    "  return (",
    "    <div className='bg-dark min-h-screen overflow-x-hidden'>",
    "      <Navbar />",
    ...body.map((section) => `      <section id='${section.toLowerCase()}' className='py-20 px-6 max-w-7xl mx-auto'><${section} /></section>`),
    "      <footer className='border-t border-white/10 py-6 text-center text-gray-500 text-sm'>",
    `        <p>© ${new Date().getFullYear()} ${jsxText(title)}</p>`,
    "      </footer>",
    "    </div>",
    "  )",
    "}",
    ""
  ].join("\n");
};

export const singleAppShell = (): string =>
  [
    "import AppComponent from './components/App'",
    "",
    "export default function App() {",
    "  return (",
    "    <div className='min-h-screen overflow-x-hidden'>",
    "      <AppComponent />",
    "    </div>",
    "  )",
    "}",
    ""
  ].join("\n");

// Components the generator must write for a specification, in generation order.
export const plannedComponents = (spec: ProjectSpecification): string[] =>
  spec.strategy === "react-app" ? ["App"] : ["Navbar", ...spec.sections.filter((section) => section !== "Navbar")];

export const componentPath = (name: string): string => `src/components/${name}.jsx`;

export const scaffoldFiles = (spec: ProjectSpecification): GeneratedFile[] => [
  { path: "package.json", content: packageJson(spec) },
  { path: "vite.config.js", content: viteConfig() },
  { path: "tailwind.config.js", content: tailwindConfig() },
  { path: "postcss.config.js", content: "export default { plugins: { tailwindcss: {}, autoprefixer: {} } }\n" },
  { path: "index.html", content: indexHtml(spec.title) },
  { path: "src/main.jsx", content: mainJsx() },
  { path: "src/index.css", content: indexCss(spec.colorScheme) },
  {
    path: "src/App.jsx",
    content: spec.strategy === "react-app" ? singleAppShell() : sectionsAppShell(spec.title, spec.sections)
  }
];

export const allowedPackages = (): string[] => [...catalog.allowedPackages];

export const projectReadme = (
  project: string,
  details: { title: string; idea?: string; components: string[] }
): string =>
  [
    `# ${details.title}`,
    "",
    details.idea ? `> ${details.idea.replace(/\n+/g, " ")}` : "",
    "",
    "## Run locally",
    "",
    "```bash",
    "npm install",
    "npm run dev",
    "```",
    "",
    "## Components",
    "",
    ...details.components.map((name) => `- \`${componentPath(name)}\``),
    "",
    `Generated as project \`${project}\`.`,
    ""
  ].join("\n");
