import { APP_NAME, APP_TAGLINE } from "../shared/constants";

export function renderPracticePage(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${APP_NAME}</title>
  <style>
    :root {
      color-scheme: light;
      --bg: #f6f8fb;
      --card: #ffffff;
      --text: #1c2333;
      --muted: #5b6478;
      --accent: #2f5bd3;
      --low: #b42318;
      --medium: #b54708;
      --high: #067647;
      --border: #dfe4ee;
    }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      font-family: "IBM Plex Sans", "Segoe UI", sans-serif;
      background: var(--bg);
      color: var(--text);
    }
    .wrap { max-width: 960px; margin: 0 auto; padding: 16px; display: grid; gap: 12px; }
    .card { background: var(--card); border: 1px solid var(--border); border-radius: 14px; padding: 14px; }
    h1, h2 { margin: 0 0 10px; }
    h1 { font-size: 22px; }
    h2 { font-size: 16px; }
    .muted { color: var(--muted); }
    .row { display: flex; gap: 8px; align-items: center; flex-wrap: wrap; }
    textarea {
      width: 100%;
      min-height: 140px;
      padding: 10px 12px;
      border: 1px solid var(--border);
      border-radius: 10px;
      font: inherit;
    }
    input { padding: 10px 12px; border: 1px solid var(--border); border-radius: 10px; min-width: 220px; }
    button {
      border: 0;
      border-radius: 10px;
      padding: 10px 12px;
      background: var(--accent);
      color: #fff;
      font-weight: 600;
      cursor: pointer;
    }
    button.secondary { background: #e8ecf5; color: var(--text); }
    .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 10px; }
    .level-low { border-left: 4px solid var(--low); }
    .level-medium { border-left: 4px solid var(--medium); }
    .level-high { border-left: 4px solid var(--high); }
    .readiness-low { color: var(--low); }
    .readiness-medium { color: var(--medium); }
    .readiness-high { color: var(--high); }
    ul { margin: 6px 0 0; padding-left: 18px; }
    pre { white-space: pre-wrap; word-break: break-word; }
    .hidden { display: none; }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="card">
      <h1>${APP_NAME}</h1>
      <div class="muted">${APP_TAGLINE}</div>
    </div>

    <div class="card" id="question-card">
      <div class="muted" id="question-meta"></div>
      <h2 id="question-text">Loading questions...</h2>
      <textarea id="answer" placeholder="Type your answer"></textarea>
      <div class="row" style="margin-top: 8px;">
        <button id="submit">Submit answer</button>
        <button class="secondary" id="finish">Finish interview</button>
        <button class="secondary" id="reset">Start over</button>
      </div>
      <div class="muted" id="status"></div>
    </div>

    <div class="card hidden" id="feedback">
      <h2>Feedback</h2>
      <div class="grid" id="dimensions"></div>
      <div style="margin-top: 10px;">
        Running overall: <strong id="overall"></strong>
        <span id="readiness"></span>
      </div>
    </div>

    <div class="card hidden" id="report">
      <h2>Final report</h2>
      <div class="row">
        <input id="interviewer-name" placeholder="Interviewer name" />
        <input id="interviewer-email" placeholder="Interviewer email" />
        <button class="secondary" id="refresh-report">Refresh</button>
      </div>
      <div id="report-body"></div>
    </div>
  </div>

  <script>
    const sessionKey = "interview_scorecard_session";
    const state = {
      sessionId: localStorage.getItem(sessionKey) || newSessionId(),
      questions: [],
      index: 0,
    };
    localStorage.setItem(sessionKey, state.sessionId);

    function newSessionId() {
      return "s-" + Date.now().toString(36) + "-" + Math.random().toString(36).slice(2, 8);
    }

    function byId(id) {
      return document.getElementById(id);
    }

    function escapeHtml(value) {
      return String(value)
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;");
    }

    async function api(path, options) {
      const response = await fetch(path, {
        headers: { "content-type": "application/json" },
        ...options,
      });
      const payload = await response.json();
      if (!response.ok) {
        throw new Error(payload.error || "Request failed");
      }
      return payload;
    }

    function renderQuestion() {
      const question = state.questions[state.index];
      if (!question) {
        byId("question-meta").textContent = "All questions answered";
        byId("question-text").textContent = "Finish the interview to see your report.";
        byId("submit").disabled = true;
        return;
      }
      byId("submit").disabled = false;
      byId("question-meta").textContent =
        "Question " + (state.index + 1) + " of " + state.questions.length + " · " + question.category;
      byId("question-text").textContent = question.text;
      byId("answer").value = "";
    }

    function renderFeedback(data) {
      const cards = data.explanations.map((explanation) => {
        const suggestion = data.suggestions[explanation.dimension];
        const evidence = explanation.signalsDetected.map((item) => "<li>" + escapeHtml(item) + "</li>").join("");
        return (
          '<div class="card level-' + suggestion.level + '">' +
          "<strong>" + escapeHtml(explanation.label) + ": " + explanation.score + "/10</strong>" +
          "<div>" + escapeHtml(explanation.text) + "</div>" +
          "<ul>" + evidence + "</ul>" +
          '<div class="muted">' + escapeHtml(suggestion.text) + "</div>" +
          "</div>"
        );
      });
      byId("dimensions").innerHTML = cards.join("");
      byId("overall").textContent = data.runningAverages.overall + "/10";
      byId("readiness").className = data.readiness.className;
      byId("readiness").textContent = " · " + data.readiness.label;
      byId("feedback").classList.remove("hidden");
    }

    function renderReport(report) {
      const list = (items) =>
        "<ul>" + items.map((item) => "<li>" + escapeHtml(item) + "</li>").join("") + "</ul>";
      const insights = report.interviewInsights;
      byId("report-body").innerHTML =
        "<p>Overall <strong>" + report.overallScore + "/10</strong> · " +
        '<span class="' + report.readinessIndicator.className + '">' +
        escapeHtml(report.readinessIndicator.label) + "</span></p>" +
        '<p class="muted">' + escapeHtml(report.readinessIndicator.description) + "</p>" +
        "<h2>Strengths</h2>" + list(insights.strengths.map((s) => s.name + " (" + s.score + "): " + s.note)) +
        "<h2>Improvement areas</h2>" + list(insights.improvementAreas.map((s) => s.name + " (" + s.score + "): " + s.note)) +
        "<h2>Next steps</h2>" + list(insights.actionableNextSteps);
      byId("report").classList.remove("hidden");
    }

    async function loadQuestions() {
      const data = await api("/api/questions", { method: "GET" });
      state.questions = data.questions;
      state.index = 0;
      renderQuestion();
    }

    async function submitAnswer() {
      const question = state.questions[state.index];
      if (!question) return;
      byId("status").textContent = "Scoring...";
      try {
        const data = await api("/api/evaluate", {
          method: "POST",
          body: JSON.stringify({
            sessionId: state.sessionId,
            questionId: question.id,
            answer: byId("answer").value,
          }),
        });
        byId("status").textContent = "";
        renderFeedback(data);
        state.index += 1;
        renderQuestion();
      } catch (error) {
        byId("status").textContent = error.message;
      }
    }

    async function loadReport() {
      try {
        const report = await api("/api/final-report", {
          method: "POST",
          body: JSON.stringify({
            sessionId: state.sessionId,
            interviewer: {
              name: byId("interviewer-name").value,
              email: byId("interviewer-email").value,
            },
          }),
        });
        byId("status").textContent = "";
        renderReport(report);
      } catch (error) {
        byId("status").textContent = error.message;
      }
    }

    async function resetSession() {
      await api("/api/reset", { method: "POST", body: JSON.stringify({ sessionId: state.sessionId }) });
      state.sessionId = newSessionId();
      localStorage.setItem(sessionKey, state.sessionId);
      byId("feedback").classList.add("hidden");
      byId("report").classList.add("hidden");
      await loadQuestions();
    }

    byId("submit").addEventListener("click", submitAnswer);
    byId("finish").addEventListener("click", loadReport);
    byId("refresh-report").addEventListener("click", loadReport);
    byId("reset").addEventListener("click", () => {
      resetSession().catch((error) => {
        byId("status").textContent = error.message;
      });
    });

    loadQuestions().catch((error) => {
      byId("question-text").textContent = "Failed to load questions: " + error.message;
    });
  </script>
</body>
</html>`;
}
