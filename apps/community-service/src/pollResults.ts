import { PollType } from "./rows.js";

export type OptionTally = { optionId: string; text: string; orderIndex: number; votes: number };

export type ResultType = "no_votes" | "clear_winner" | "tie";
export type ParticipationLevel = "no_participation" | "low" | "moderate" | "high";

const round1 = (value: number) => Math.round(value * 10) / 10;

export const participationLevel = (totalVotes: number): ParticipationLevel => {
  if (totalVotes === 0) return "no_participation";
  if (totalVotes < 5) return "low";
  if (totalVotes < 20) return "moderate";
  return "high";
};

export const analyzePoll = (input: {
  pollId: string;
  question: string;
  options: OptionTally[];
  isActive: boolean;
  endsAt: string | null;
  now?: number;
}) => {
  const now = input.now ?? Date.now();
  const options = [...input.options].sort((a, b) => a.orderIndex - b.orderIndex);
  const totalVotes = options.reduce((sum, option) => sum + option.votes, 0);
  const maxVotes = options.reduce((max, option) => Math.max(max, option.votes), 0);
  const winners =
    maxVotes > 0
      ? options
          .filter((option) => option.votes === maxVotes)
          .map((option) => ({ optionId: option.optionId, text: option.text, votes: option.votes }))
      : [];
  const resultType: ResultType =
    winners.length === 0 ? "no_votes" : winners.length === 1 ? "clear_winner" : "tie";
  const hasEnded = input.endsAt !== null && Date.parse(input.endsAt) <= now;

  return {
    pollId: input.pollId,
    question: input.question,
    totalVotes,
    options: options.map((option) => ({
      optionId: option.optionId,
      text: option.text,
      votes: option.votes,
      percentage: round1((option.votes / Math.max(1, totalVotes)) * 100)
    })),
    winners,
    resultType,
    isConcluded: hasEnded || !input.isActive,
    participationLevel: participationLevel(totalVotes)
  };
};

export const summarizeResults = (analysis: ReturnType<typeof analyzePoll>) => ({
  pollId: analysis.pollId,
  totalVotes: analysis.totalVotes,
  winners: analysis.winners,
  resultType: analysis.resultType
});

const LARGE_AUDIENCE = 50;

/** Default voting window in hours. */
export const suggestedDurationHours = (pollType: PollType, expectedParticipants?: number) => {
  if (pollType === "admin") return 168;
  return expectedParticipants !== undefined && expectedParticipants > LARGE_AUDIENCE ? 72 : 48;
};

export const pollEngagementLevel = (pollsCreated: number, votesCast: number) => {
  const score = pollsCreated * 2 + votesCast;
  if (score === 0) return "inactive";
  if (score < 5) return "low";
  if (score < 15) return "moderate";
  return "high";
};
