import "./styles/tailwind.css";

import { StrictMode } from "react";
import { createRoot } from "react-dom/client";

import { FeedbackPage } from "./pages/feedback";
import { LessonPage } from "./pages/lesson";

const rootElement = document.getElementById("root");

if (!rootElement) {
  throw new Error("Missing root element for frontend bootstrap");
}

const pathname = window.location?.pathname || "/";

const PageComponent = pathname.startsWith("/feedback") ? FeedbackPage : LessonPage;

createRoot(rootElement).render(
  <StrictMode>
    <PageComponent />
  </StrictMode>
);
