import {
  CreateCustomerCommand,
  DeleteCustomerCommand,
  UpdateCustomerCommand,
} from '../../../../application/port/in/CustomerCommands';
import type {CreateCustomerWebRequest, UpdateCustomerWebRequest} from '../models/CustomerWebRequest';
import type {CustomerWebResponse} from '../models/CustomerWebResponse';

export function toCreateCommand(request: CreateCustomerWebRequest): CreateCustomerCommand {
  return new CreateCustomerCommand(
    request.firstName,
    request.lastName,
    request.gender,
    request.email,
    new Date(`${request.dateOfBirth}T00:00:00.000Z`)
  );
}

export function toUpdateCommand(customerId: string, request: UpdateCustomerWebRequest): UpdateCustomerCommand {
  return new UpdateCustomerCommand(customerId, request.email);
}

export function toDeleteCommand(customerId: string): DeleteCustomerCommand {
  return new DeleteCustomerCommand(customerId);
}

export function toSuccessResponse<T>(message: string, data?: T): CustomerWebResponse<T> {
  return {
    success: true,
    message,
    data,
  };
}

export function toErrorResponse(
  message: string,
  code: string,
  details?: Record<string, unknown>
): CustomerWebResponse<never> {
  return {
    success: false,
    message,
    error: {
      code,
      details,
    },
  };
}
