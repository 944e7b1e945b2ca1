import { GOOGLE_TASKS_API_BASE } from '../auth/oauth-config'
import { TaskListError } from '../errors'
import { bearer, type HttpClient } from '../http/http-client'
import { itemsEnvelope, taskListSchema, taskSchema, type Task, type TaskList } from './models'
import { assertStatus, parseBody } from './response'

export async function listTaskLists(
  http: HttpClient,
  accessToken: string,
  baseUrl = GOOGLE_TASKS_API_BASE
): Promise<TaskList[]> {
  const response = await http.send({
    method: 'GET',
    url: `${baseUrl}/users/@me/lists`,
    headers: bearer(accessToken)
  })
  assertStatus(response, [200], 'List task lists', TaskListError)

  const { items } = parseBody(response, itemsEnvelope(taskListSchema), 'List task lists', TaskListError)
  return items
}

export async function getIncompleteTasks(
  http: HttpClient,
  accessToken: string,
  taskListId: string,
  baseUrl = GOOGLE_TASKS_API_BASE
): Promise<Task[]> {
  const response = await http.send({
    method: 'GET',
    url: `${baseUrl}/lists/${encodeURIComponent(taskListId)}/tasks`,
    headers: bearer(accessToken),
    query: { showCompleted: 'false', showHidden: 'false' }
  })
  assertStatus(response, [200], 'Get tasks', TaskListError)

  const { items } = parseBody(response, itemsEnvelope(taskSchema), 'Get tasks', TaskListError)
  return items.filter((task) => task.status !== 'completed')
}

export async function completeTask(
  http: HttpClient,
  accessToken: string,
  taskListId: string,
  taskId: string,
  baseUrl = GOOGLE_TASKS_API_BASE
): Promise<void> {
  const response = await http.send({
    method: 'PATCH',
    url: `${baseUrl}/lists/${encodeURIComponent(taskListId)}/tasks/${encodeURIComponent(taskId)}`,
    headers: bearer(accessToken),
    json: { status: 'completed' }
  })
  assertStatus(response, [200], `Complete task ${taskId}`, TaskListError)
}

/**
 * Completes tasks one by one. Stops at the first failure; tasks completed
 * before it stay completed.
 */
export async function completeTasks(
  http: HttpClient,
  accessToken: string,
  taskListId: string,
  taskIds: string[],
  baseUrl = GOOGLE_TASKS_API_BASE
): Promise<void> {
  for (const taskId of taskIds) {
    await completeTask(http, accessToken, taskListId, taskId, baseUrl)
  }
}
