import { Suspense, lazy } from "react";
import { Route, Routes } from "react-router-dom";
import { Panel } from "@repo/ui";
import { AppShell } from "./components/layout/AppShell";
import { BacktestPage } from "./pages/BacktestPage";

const DocumentationPage = lazy(() =>
  import("./pages/DocumentationPage").then((module) => ({
    default: module.DocumentationPage,
  })),
);
const AboutPage = lazy(() =>
  import("./pages/AboutPage").then((module) => ({
    default: module.AboutPage,
  })),
);

function RouteFallback() {
  return <Panel className="p-6 text-sm text-slate-300">Loading page...</Panel>;
}

function NotFoundPage() {
  return (
    <Panel className="p-6">
      <p className="text-sm text-slate-300">Unknown route.</p>
    </Panel>
  );
}

export default function Root() {
  return (
    <Routes>
      <Route element={<AppShell />}>
        <Route index element={<BacktestPage />} />
        <Route
          path="/docs"
          element={
            <Suspense fallback={<RouteFallback />}>
              <DocumentationPage />
            </Suspense>
          }
        />
        <Route
          path="/about"
          element={
            <Suspense fallback={<RouteFallback />}>
              <AboutPage />
            </Suspense>
          }
        />
        <Route path="*" element={<NotFoundPage />} />
      </Route>
    </Routes>
  );
}
