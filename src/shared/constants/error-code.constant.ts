export enum ErrorCodeEnum {
  EventValidationFailed = 30400,
  OutboxEventNotFound = 30404,
  OutboxIllegalTransition = 30409,

  WebhookEndpointInvalid = 31400,
  WebhookEndpointNotFound = 31404,
}

export const ErrorCode = Object.freeze<Record<ErrorCodeEnum, [string, number]>>({
  [ErrorCodeEnum.EventValidationFailed]: ['Event must have type, aggregate type and aggregate id', 400],
  [ErrorCodeEnum.OutboxEventNotFound]: ['Outbox event not found', 404],
  [ErrorCodeEnum.OutboxIllegalTransition]: ['Outbox event cannot move to the requested status', 409],

  [ErrorCodeEnum.WebhookEndpointInvalid]: ['Invalid webhook endpoint configuration', 400],
  [ErrorCodeEnum.WebhookEndpointNotFound]: ['Webhook endpoint not found', 404],
});
