/**
 * Client-facing messages, in Russian as existing API clients expect them
 */

export const MESSAGES = {
  invalidId: "Некорректный идентификатор",
  problemNotFound: "Задача не найдена",
  problemCreateFailed: "Ошибка при создании задачи",
  validationFailed: "Ошибка валидации",
  routeNotFound: "Маршрут не найден",
  internalError: "Внутренняя ошибка сервера",
  problemDeleted: (id: string) => `Задача Id=${id} была удалена`,
} as const;
