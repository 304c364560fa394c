import type { HomeworkStatus } from '@root/types/homework.types.js'

export const HOMEWORK_VERDICTS: Readonly<Record<HomeworkStatus, string>> =
  Object.freeze({
    approved: 'Работа проверена: ревьюеру всё понравилось. Ура!',
    reviewing: 'Работа взята на проверку ревьюером.',
    rejected: 'Работа проверена: у ревьюера есть замечания.',
  })

export function isHomeworkStatus(value: string): value is HomeworkStatus {
  return Object.hasOwn(HOMEWORK_VERDICTS, value)
}
