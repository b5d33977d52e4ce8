import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import { TicketRequest } from '../tickets.types';

// Every property is optional at the shape level: absent or blank values are
// business validation failures (422), wrong types are malformed input (400).

export class TicketAddressDto {
  @ApiPropertyOptional({ example: 'Rua das Flores' })
  @IsOptional()
  @IsString()
  rua?: string;

  @ApiPropertyOptional({ example: '123' })
  @IsOptional()
  @IsString()
  numero?: string;

  @ApiPropertyOptional({ example: 'Apto 4' })
  @IsOptional()
  @IsString()
  complemento?: string;

  @ApiPropertyOptional({ example: 'Centro' })
  @IsOptional()
  @IsString()
  bairro?: string;

  @ApiPropertyOptional({ example: 'São Paulo' })
  @IsOptional()
  @IsString()
  cidade?: string;

  @ApiPropertyOptional({ example: 'SP' })
  @IsOptional()
  @IsString()
  estado?: string;

  @ApiPropertyOptional({ example: '01001-000' })
  @IsOptional()
  @IsString()
  cep?: string;
}

export class TicketDeviceDto {
  @ApiPropertyOptional({ example: 'Acme' })
  @IsOptional()
  @IsString()
  marca?: string;

  @ApiPropertyOptional({ example: 'Phone X' })
  @IsOptional()
  @IsString()
  modelo?: string;

  @ApiPropertyOptional({ example: 'SN123456789012', description: 'At least 5 characters' })
  @IsOptional()
  @IsString()
  numero_serie?: string;

  @ApiPropertyOptional({ example: '2023-11-20', description: 'YYYY-MM-DD or ISO-8601 timestamp' })
  @IsOptional()
  @IsString()
  data_compra?: string;

  @ApiPropertyOptional({ example: 'NF-2023-001234' })
  @IsOptional()
  @IsString()
  nota_fiscal?: string;

  @ApiPropertyOptional({ example: 'Tela não liga' })
  @IsOptional()
  @IsString()
  defeito_relatado?: string;
}

export class CreateTicketDto {
  @ApiProperty({ example: 'Maria Souza' })
  @IsOptional()
  @IsString()
  nome_completo?: string;

  @ApiProperty({ example: '529.982.247-25', description: 'CPF, with or without punctuation' })
  @IsOptional()
  @IsString()
  cpf?: string;

  @ApiProperty({ example: 'maria.souza@example.com' })
  @IsOptional()
  @IsString()
  email?: string;

  @ApiProperty({ example: '+55 11 98765-4321' })
  @IsOptional()
  @IsString()
  telefone?: string;

  @ApiProperty({ type: TicketAddressDto })
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => TicketAddressDto)
  endereco?: TicketAddressDto;

  @ApiProperty({ type: TicketDeviceDto })
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => TicketDeviceDto)
  aparelho?: TicketDeviceDto;

  @ApiPropertyOptional({ example: 'Comprado na loja do centro' })
  @IsOptional()
  @IsString()
  observacoes?: string;
}

export function toTicketRequest(dto: CreateTicketDto): TicketRequest {
  const address = dto.endereco;
  const device = dto.aparelho;
  return {
    fullName: dto.nome_completo ?? '',
    nationalId: dto.cpf ?? '',
    email: dto.email ?? '',
    phone: dto.telefone ?? '',
    address: {
      street: address?.rua ?? '',
      number: address?.numero ?? '',
      complement: address?.complemento ?? '',
      district: address?.bairro ?? '',
      city: address?.cidade ?? '',
      state: address?.estado ?? '',
      postalCode: address?.cep ?? '',
    },
    device: {
      brand: device?.marca ?? '',
      model: device?.modelo ?? '',
      serialNumber: device?.numero_serie ?? '',
      purchaseDate: device?.data_compra ?? '',
      invoiceNumber: device?.nota_fiscal ?? '',
      reportedDefect: device?.defeito_relatado ?? '',
    },
    notes: dto.observacoes ?? '',
  };
}
