/**
 * Wire shapes. The domain is camelCase; the JSON API is snake_case, except for
 * forum payloads, which clients consume in camelCase as produced by ForumService.
 */

import { ExamType } from '../models/examType.model';
import { News } from '../models/news.model';
import { Question } from '../models/question.model';
import { Subject } from '../models/subject.model';
import { Test } from '../models/test.model';
import { User } from '../models/user.model';
import { LeaderboardEntry } from '../services/attempt.service';
import { DescribedAttempt } from '../services/attemptDescriber';
import { ResultSummary } from '../services/result.service';
import { AuthSession, BulkUploadReport } from '../services/user.service';
import { TestWithQuestions } from '../services/test.service';
import { TestAnalytics } from './analytics';
import { AttemptResult } from './attemptResult';

export function toUserResponse(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    full_name: user.fullName,
    role: user.role,
    is_active: user.isActive,
    created_at: user.createdAt,
  };
}

export function toLoginResponse(session: AuthSession) {
  return {
    access_token: session.token.accessToken,
    token_type: session.token.tokenType,
    expires_at: session.token.expiresAt,
    user: {
      id: session.user.id,
      username: session.user.username,
      full_name: session.user.fullName,
      email: session.user.email,
      role: session.user.role,
    },
  };
}

export function toBulkUploadResponse(report: BulkUploadReport) {
  return {
    total_processed: report.totalProcessed,
    successful: report.successful,
    failed: report.failed,
    details: report.details,
  };
}

export function toCatalogResponse(entry: ExamType | Subject) {
  return {
    id: entry.id,
    name: entry.name,
    description: entry.description,
    created_at: entry.createdAt,
  };
}

export function toQuestionResponse(question: Question) {
  return {
    id: question.id,
    exam_type_id: question.examTypeId,
    subject_id: question.subjectId,
    question_text: question.questionText,
    question_image: question.questionImage,
    question_type: question.questionType,
    options: question.options,
    correct_answer: question.correctAnswer,
    explanation: question.explanation,
    explanation_image: question.explanationImage,
    created_at: question.createdAt,
  };
}

export function toTestResponse(test: Test) {
  return {
    id: test.id,
    title: test.title,
    exam_type_id: test.examTypeId,
    subject_id: test.subjectId,
    duration_minutes: test.durationMinutes,
    question_count: test.questionCount,
    total_marks: test.totalMarks,
    passing_marks: test.passingMarks,
    is_active: test.isActive,
    created_by: test.createdBy,
    created_at: test.createdAt,
  };
}

export function toTestWithQuestionsResponse({ test, questions }: TestWithQuestions) {
  return {
    ...toTestResponse(test),
    questions: questions.map(toQuestionResponse),
  };
}

export function toAttemptResponse({ attempt, test }: DescribedAttempt) {
  const outcome =
    attempt.status === 'completed'
      ? {
          end_time: attempt.endTime,
          score: attempt.score,
          percentage: attempt.percentage,
          passed: attempt.passed,
          time_taken: attempt.timeTaken,
        }
      : { end_time: null, score: null, percentage: null, passed: null, time_taken: null };

  return {
    id: attempt.id,
    user_id: attempt.userId,
    test_id: attempt.testId,
    exam_type_id: attempt.examTypeId,
    subject_id: attempt.subjectId,
    is_practice: attempt.isPractice,
    start_time: attempt.startTime,
    status: attempt.status,
    ...outcome,
    test: {
      id: test.id,
      title: test.title,
      total_marks: test.totalMarks,
      passing_marks: test.passingMarks,
      duration_minutes: test.durationMinutes,
    },
  };
}

export function toAttemptResultResponse(result: AttemptResult) {
  return {
    attempt_id: result.attemptId,
    user_id: result.userId,
    test_id: result.testId,
    test_title: result.testTitle,
    start_time: result.startTime,
    end_time: result.endTime,
    time_taken: result.timeTaken,
    total_questions: result.totalQuestions,
    correct_answers: result.correctAnswers,
    score: result.score,
    percentage: result.percentage,
    passed: result.passed,
    answers: result.answers.map((answer) => ({
      question_id: answer.questionId,
      question_text: answer.questionText,
      user_answer: answer.userAnswer,
      correct_answer: answer.correctAnswer,
      is_correct: answer.isCorrect,
      marks_obtained: answer.marksObtained,
      total_marks: answer.totalMarks,
      explanation: answer.explanation,
      explanation_image: answer.explanationImage,
    })),
  };
}

export function toResultSummaryResponse(summary: ResultSummary) {
  return {
    attempt_id: summary.attemptId,
    test_title: summary.testTitle,
    score: summary.score,
    percentage: summary.percentage,
    passed: summary.passed,
    completed_at: summary.completedAt,
  };
}

export function toAnalyticsResponse(analytics: TestAnalytics) {
  if (!analytics.hasData) {
    return {
      test_id: analytics.testId,
      total_attempts: analytics.totalAttempts,
      message: 'No completed attempts found',
    };
  }
  return {
    test_id: analytics.testId,
    total_attempts: analytics.totalAttempts,
    passed_attempts: analytics.passedAttempts,
    pass_rate: analytics.passRate,
    average_score: analytics.averageScore,
    average_percentage: analytics.averagePercentage,
    highest_score: analytics.highestScore,
    lowest_score: analytics.lowestScore,
  };
}

export function toLeaderboardResponse(entry: LeaderboardEntry) {
  return {
    rank: entry.rank,
    user_id: entry.userId,
    username: entry.username,
    full_name: entry.fullName,
    average_percentage: entry.averagePercentage,
    attempt_count: entry.attemptCount,
    latest_test_title: entry.latestTitle,
  };
}

export function toNewsResponse(news: News) {
  return {
    id: news.id,
    title: news.title,
    content: news.content,
    url: news.url,
    date: news.date,
    created_at: news.createdAt,
    updated_at: news.updatedAt,
  };
}
