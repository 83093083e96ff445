// ---------------------------------------------------------------------------
// Lines the companion says
// ---------------------------------------------------------------------------

export const ENCOURAGE_LINES = [
  "Write one sentence. That's progress.",
  "Draft first, polish later.",
  "Keep it simple: one paragraph at a time.",
  "Cite as you go, future you will thank you.",
  "If it feels hard, shrink the task.",
  "Save your work. Ctrl+S 😉",
] as const

export const REST_TIPS = [
  "Time to stretch. Relax your shoulders.",
  "Hydration check ✅ Take a sip of water.",
  "Look 20 seconds at something far away.",
  "Stand up for 30 seconds, your neck will thank you.",
] as const

export const onOff = (enabled: boolean): string => (enabled ? "ON ✅" : "OFF ❎")
